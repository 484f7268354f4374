import { Api } from 'telegram';
import { ChatMessage, MessageAttachment, WebPreview } from '../models';

/**
 * Преобразует сообщение GramJS в сообщение конвейера загрузки
 */
export function toChatMessage(message: Api.Message): ChatMessage<Api.Message> {
  return {
    id: message.id,
    date: new Date(message.date * 1000),
    text: message.message || '',
    media: toAttachment(message.media),
    webPreview: toWebPreview(message.media),
    senderId: message.senderId?.toString(),
    source: message,
  };
}

/**
 * Определяет тип вложения. Превью веб-страниц вложением не считаются.
 */
export function toAttachment(
  media: Api.TypeMessageMedia | undefined,
): MessageAttachment | undefined {
  if (!media || media instanceof Api.MessageMediaEmpty) return undefined;
  if (media instanceof Api.MessageMediaWebPage) return undefined;

  if (media instanceof Api.MessageMediaPhoto) {
    return media.photo instanceof Api.Photo
      ? { kind: 'photo' }
      : { kind: 'unknown', description: 'PhotoEmpty' };
  }

  if (media instanceof Api.MessageMediaDocument) {
    const document = media.document;
    if (!(document instanceof Api.Document)) {
      return { kind: 'unknown', description: 'DocumentEmpty' };
    }

    const fileName = document.attributes.find(
      (attr): attr is Api.DocumentAttributeFilename =>
        attr instanceof Api.DocumentAttributeFilename,
    )?.fileName;
    const animated = document.attributes.some(
      (attr) => attr instanceof Api.DocumentAttributeAnimated,
    );

    return {
      kind: animated ? 'animated-image' : 'document',
      mimeType: document.mimeType || undefined,
      fileName: fileName || undefined,
    };
  }

  return { kind: 'unknown', description: media.className };
}

export function toWebPreview(
  media: Api.TypeMessageMedia | undefined,
): WebPreview | undefined {
  if (!(media instanceof Api.MessageMediaWebPage)) return undefined;

  const webpage = media.webpage;
  return { url: webpage instanceof Api.WebPage ? webpage.url : undefined };
}
