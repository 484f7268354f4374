import { ChatMessage, FilterConfig } from '../models';
import { extractUrls } from '../utils/links';

/**
 * Есть ли в сообщении ссылка: URL в тексте или превью веб-страницы
 */
export function hasLinks(message: ChatMessage): boolean {
  return (
    message.webPreview !== undefined || extractUrls(message.text).length > 0
  );
}

/**
 * Проверяет, подходит ли сообщение под фильтр. Не изменяет сообщение.
 */
export function matchesFilter(
  message: ChatMessage,
  config: FilterConfig,
): boolean {
  if (config.minTimestamp && message.date < config.minTimestamp) {
    return false;
  }

  if (config.containsText) {
    const needle = config.containsText.toLowerCase();
    if (!message.text.toLowerCase().includes(needle)) {
      return false;
    }
  }

  const kind = message.media?.kind;

  switch (config.mediaType) {
    case 'photos':
      return kind === 'photo';
    case 'documents':
      return kind === 'document';
    case 'gifs':
      return kind === 'animated-image';
    case 'links':
      return hasLinks(message);
    case 'all':
      return kind !== undefined || hasLinks(message);
    default: {
      const unreachable: never = config.mediaType;
      throw new Error(`Unknown media type: ${String(unreachable)}`);
    }
  }
}

/**
 * Лениво отбирает подходящие сообщения из истории.
 *
 * При `maxMessages > 0` генератор завершается сразу после достижения лимита
 * и больше не запрашивает upstream (его итератор закрывается). Ошибки
 * пагинации пробрасываются без изменений.
 */
export async function* filterMessages<TSource>(
  messages: AsyncIterable<ChatMessage<TSource>> | Iterable<ChatMessage<TSource>>,
  config: FilterConfig,
): AsyncGenerator<ChatMessage<TSource>, void, undefined> {
  const limited = config.maxMessages > 0;
  let scanned = 0;
  let qualifying = 0;

  for await (const message of messages) {
    scanned++;

    if (matchesFilter(message, config)) {
      qualifying++;
      yield message;
    }

    if (limited) {
      const counted =
        config.limitScope === 'scanned' ? scanned : qualifying;
      if (counted >= config.maxMessages) return;
    }
  }
}
