import { formatConsoleLine } from '../../src/utils/logger';

describe('formatConsoleLine', () => {
  it('should render the service label and extra metadata', () => {
    expect(
      formatConsoleLine({
        level: 'info',
        message: 'Загружено: a.jpg',
        timestamp: '12:00:00',
        service: 'DownloadService',
        kind: 'photo',
      }),
    ).toBe('12:00:00 info [DownloadService] Загружено: a.jpg {"kind":"photo"}');
  });

  it('should omit the label and metadata when absent', () => {
    expect(
      formatConsoleLine({ level: 'warn', message: 'done', timestamp: '08:30:00' }),
    ).toBe('08:30:00 warn done');
  });
});
