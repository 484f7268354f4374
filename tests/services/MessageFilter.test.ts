/**
 * Тесты фильтра сообщений
 */

import {
  filterMessages,
  hasLinks,
  matchesFilter,
} from '../../src/services/MessageFilter';
import {
  CountingHistory,
  NOW,
  collect,
  createFilter,
  createMessage,
} from '../helpers/messages';

const DAY_MS = 24 * 60 * 60 * 1000;

describe('MessageFilter', () => {
  describe('matchesFilter', () => {
    it('should keep a message sent exactly at the lower bound', () => {
      const config = createFilter({ minTimestamp: NOW });
      const message = createMessage({ id: 1, date: NOW, media: { kind: 'photo' } });

      expect(matchesFilter(message, config)).toBe(true);
    });

    it('should reject messages older than the lower bound', () => {
      const config = createFilter({
        minTimestamp: new Date(NOW.getTime() - 3 * DAY_MS),
      });
      const message = createMessage({
        id: 1,
        date: new Date(NOW.getTime() - 3 * DAY_MS - 1),
        media: { kind: 'photo' },
      });

      expect(matchesFilter(message, config)).toBe(false);
    });

    it('should match contained text case-insensitively', () => {
      const config = createFilter({ containsText: 'FuNnY' });

      expect(
        matchesFilter(
          createMessage({ id: 1, text: 'a Funny cat', media: { kind: 'photo' } }),
          config,
        ),
      ).toBe(true);
      expect(
        matchesFilter(
          createMessage({ id: 2, text: 'serious', media: { kind: 'photo' } }),
          config,
        ),
      ).toBe(false);
    });

    it('should reject messages without text when contains is set', () => {
      const config = createFilter({ containsText: 'report' });
      const message = createMessage({ id: 1, media: { kind: 'document' } });

      expect(matchesFilter(message, config)).toBe(false);
    });

    it('should require the matching attachment kind per media type', () => {
      const photo = createMessage({ id: 1, media: { kind: 'photo' } });
      const document = createMessage({
        id: 2,
        media: { kind: 'document', mimeType: 'application/pdf' },
      });
      const gif = createMessage({
        id: 3,
        media: { kind: 'animated-image', mimeType: 'video/mp4' },
      });
      const plain = createMessage({ id: 4, text: 'no media here' });

      const photos = createFilter({ mediaType: 'photos' });
      const documents = createFilter({ mediaType: 'documents' });
      const gifs = createFilter({ mediaType: 'gifs' });

      expect([photo, document, gif, plain].map((m) => matchesFilter(m, photos))).toEqual([
        true,
        false,
        false,
        false,
      ]);
      expect(
        [photo, document, gif, plain].map((m) => matchesFilter(m, documents)),
      ).toEqual([false, true, false, false]);
      expect([photo, document, gif, plain].map((m) => matchesFilter(m, gifs))).toEqual([
        false,
        false,
        true,
        false,
      ]);
    });

    it('should accept links from text or a web preview in links mode', () => {
      const config = createFilter({ mediaType: 'links' });

      expect(
        matchesFilter(createMessage({ id: 1, text: 'see https://example.org/a' }), config),
      ).toBe(true);
      expect(
        matchesFilter(
          createMessage({ id: 2, webPreview: { url: 'https://example.org' } }),
          config,
        ),
      ).toBe(true);
      expect(
        matchesFilter(
          createMessage({ id: 3, text: 'photo!', media: { kind: 'photo' } }),
          config,
        ),
      ).toBe(false);
    });

    it('should accept any attachment or link in all mode', () => {
      const config = createFilter();

      expect(
        matchesFilter(
          createMessage({ id: 1, media: { kind: 'unknown', description: 'MessageMediaPoll' } }),
          config,
        ),
      ).toBe(true);
      expect(matchesFilter(createMessage({ id: 2, text: 'http://a.co' }), config)).toBe(true);
      expect(matchesFilter(createMessage({ id: 3, text: 'just words' }), config)).toBe(false);
    });

    it('should not mutate the message', () => {
      const message = createMessage({ id: 1, text: 'Check http://a.co' });
      const snapshot = JSON.stringify(message);

      matchesFilter(message, createFilter({ mediaType: 'links', containsText: 'check' }));

      expect(JSON.stringify(message)).toBe(snapshot);
    });
  });

  describe('hasLinks', () => {
    it('should ignore scheme-less and malformed tokens', () => {
      expect(hasLinks(createMessage({ id: 1, text: 'www.example.org http://' }))).toBe(false);
    });
  });

  describe('filterMessages', () => {
    it('should yield only qualifying messages in upstream order (scenario A)', async () => {
      const messages = [
        createMessage({ id: 1, text: 'check this http://a.co' }),
        createMessage({ id: 2, text: 'photo!', media: { kind: 'photo' } }),
      ];

      const result = await collect(
        filterMessages(messages, createFilter({ mediaType: 'links' })),
      );

      expect(result.map((m) => m.id)).toEqual([1]);
    });

    it('should stop pulling upstream after maxMessages qualifying messages', async () => {
      const history = new CountingHistory(
        Array.from({ length: 150 }, (_, i) =>
          createMessage({ id: i + 1, media: { kind: 'photo' } }),
        ),
      );

      const result = await collect(
        filterMessages(history, createFilter({ mediaType: 'photos', maxMessages: 100 })),
      );

      expect(result).toHaveLength(100);
      expect(result[99].id).toBe(100);
      expect(history.pulled).toBe(100);
      expect(history.closed).toBe(true);
    });

    it('should count qualifying messages, not scanned ones, by default', async () => {
      const messages = [
        createMessage({ id: 1, text: 'no media' }),
        createMessage({ id: 2, media: { kind: 'photo' } }),
        createMessage({ id: 3, text: 'still nothing' }),
        createMessage({ id: 4, media: { kind: 'photo' } }),
        createMessage({ id: 5, media: { kind: 'photo' } }),
      ];
      const history = new CountingHistory(messages);

      const result = await collect(
        filterMessages(history, createFilter({ mediaType: 'photos', maxMessages: 2 })),
      );

      expect(result.map((m) => m.id)).toEqual([2, 4]);
      expect(history.pulled).toBe(4);
    });

    it('should bound raw messages scanned when limitScope is scanned', async () => {
      const messages = [
        createMessage({ id: 1, text: 'no media' }),
        createMessage({ id: 2, media: { kind: 'photo' } }),
        createMessage({ id: 3, text: 'still nothing' }),
        createMessage({ id: 4, media: { kind: 'photo' } }),
      ];
      const history = new CountingHistory(messages);

      const result = await collect(
        filterMessages(
          history,
          createFilter({ mediaType: 'photos', maxMessages: 3, limitScope: 'scanned' }),
        ),
      );

      expect(result.map((m) => m.id)).toEqual([2]);
      expect(history.pulled).toBe(3);
    });

    it('should run until the upstream is exhausted when maxMessages is 0', async () => {
      const history = new CountingHistory(
        Array.from({ length: 250 }, (_, i) =>
          createMessage({ id: i + 1, media: { kind: 'photo' } }),
        ),
      );

      const result = await collect(filterMessages(history, createFilter()));

      expect(result).toHaveLength(250);
      expect(history.pulled).toBe(250);
    });

    it('should yield the same subsequence for a replayed upstream', async () => {
      const messages = [
        createMessage({ id: 1, text: 'funny gif', media: { kind: 'animated-image' } }),
        createMessage({ id: 2, text: 'boring gif', media: { kind: 'animated-image' } }),
        createMessage({ id: 3, text: 'FUNNY again', media: { kind: 'animated-image' } }),
      ];
      const config = createFilter({ mediaType: 'gifs', containsText: 'funny' });

      const first = await collect(filterMessages(messages, config));
      const second = await collect(filterMessages(messages, config));

      expect(first.map((m) => m.id)).toEqual([1, 3]);
      expect(second).toEqual(first);
    });

    it('should pass upstream errors through unmodified', async () => {
      const failure = new Error('FLOOD_WAIT_30');
      async function* failingHistory() {
        yield createMessage({ id: 1, media: { kind: 'photo' } });
        throw failure;
      }

      const iterator = filterMessages(failingHistory(), createFilter());

      await expect(iterator.next()).resolves.toEqual({
        done: false,
        value: expect.objectContaining({ id: 1 }),
      });
      await expect(iterator.next()).rejects.toBe(failure);
    });
  });
});
