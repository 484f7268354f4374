/**
 * Message model - a history message as seen by the download pipeline
 */

export type MessageAttachment =
  | { kind: 'photo' }
  | { kind: 'document'; mimeType?: string; fileName?: string }
  | { kind: 'animated-image'; mimeType?: string; fileName?: string }
  | { kind: 'unknown'; description: string };

export type AttachmentKind = MessageAttachment['kind'];

export interface WebPreview {
  url?: string;
}

/**
 * `source` is the platform handle the download sink needs to fetch the bytes
 * (for GramJS the original `Api.Message`). Never inspected by the core.
 */
export interface ChatMessage<TSource = unknown> {
  readonly id: number;
  readonly date: Date;
  readonly text: string;
  readonly media?: MessageAttachment;
  readonly webPreview?: WebPreview;
  readonly senderId?: string;
  readonly source: TSource;
}
