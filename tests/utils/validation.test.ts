/**
 * Validation utilities tests
 */

import {
  DEFAULT_LIMIT,
  buildFilterConfig,
  parseDownloadOptions,
} from '../../src/utils/validation';
import { ValidationError } from '../../src/utils/errors';

describe('validation', () => {
  describe('parseDownloadOptions', () => {
    it('should apply defaults', () => {
      expect(
        parseDownloadOptions({ entityId: '-1001234567890', downloadDir: 'downloads' }),
      ).toEqual({
        entityId: '-1001234567890',
        mediaType: 'all',
        limit: DEFAULT_LIMIT,
        limitScope: 'qualifying',
        downloadDir: 'downloads',
        order: 'newest-first',
      });
    });

    it('should coerce numeric strings from the command line', () => {
      const options = parseDownloadOptions({
        entityId: '42',
        downloadDir: 'out',
        limit: '0',
        days: '7',
        mediaType: 'gifs',
      });

      expect(options.limit).toBe(0);
      expect(options.days).toBe(7);
      expect(options.mediaType).toBe('gifs');
    });

    it('should throw a ValidationError listing every invalid field', () => {
      expect(() =>
        parseDownloadOptions({
          entityId: 'my-channel',
          downloadDir: 'out',
          mediaType: 'videos',
          limit: '-5',
        }),
      ).toThrow(ValidationError);

      expect(() =>
        parseDownloadOptions({ entityId: 'abc', downloadDir: 'out', limit: '-1' }),
      ).toThrow(
        'Validation failed: entityId: Entity ID must be an integer, limit: Must be a non-negative integer',
      );
    });

    it('should accept numeric entity IDs only', () => {
      expect(() =>
        parseDownloadOptions({ entityId: '@somechannel', downloadDir: 'out' }),
      ).toThrow('Validation failed: entityId: Entity ID must be an integer');
    });

    it('should reject a fractional limit', () => {
      expect(() =>
        parseDownloadOptions({ entityId: '1', downloadDir: 'out', limit: '2.5' }),
      ).toThrow('limit: Must be an integer');
    });
  });

  describe('buildFilterConfig', () => {
    const now = new Date('2026-10-18T12:00:00Z');

    it('should convert days to a lower bound', () => {
      const options = parseDownloadOptions({ entityId: '1', downloadDir: 'out', days: 2 });

      expect(buildFilterConfig(options, now).minTimestamp).toEqual(
        new Date('2026-10-16T12:00:00Z'),
      );
    });

    it('should treat zero days and blank text as unset', () => {
      const options = parseDownloadOptions({
        entityId: '1',
        downloadDir: 'out',
        days: 0,
        contains: '   ',
      });

      expect(buildFilterConfig(options, now)).toEqual({
        mediaType: 'all',
        maxMessages: DEFAULT_LIMIT,
        limitScope: 'qualifying',
      });
    });

    it('should return a frozen config', () => {
      const options = parseDownloadOptions({
        entityId: '1',
        downloadDir: 'out',
        contains: 'Funny',
      });

      const config = buildFilterConfig(options, now);

      expect(config.containsText).toBe('Funny');
      expect(Object.isFrozen(config)).toBe(true);
    });
  });
});
