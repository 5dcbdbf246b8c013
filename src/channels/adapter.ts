export interface InboundDocument {
  readonly fileId: string;
  readonly filename: string;
  /** Bytes, as announced by the platform. */
  readonly size: number;
  readonly mimeType?: string;
}

export interface InboundMessage {
  readonly id: string;
  readonly channelId: string;
  readonly senderId: string;
  readonly senderName: string;
  readonly chatId: string;
  readonly text?: string;
  readonly document?: InboundDocument;
  readonly timestamp: number;
}

export type MessageHandler = (msg: InboundMessage) => Promise<void>;

export interface SendTextParams {
  readonly to: string;
  readonly text: string;
  readonly replyToId?: string;
  /** Render Telegram-style `*bold*` markup. */
  readonly markdown?: boolean;
}

export interface SendDocumentParams {
  readonly to: string;
  readonly filename: string;
  readonly data: Buffer;
  readonly caption?: string;
}

/** What the bot router needs from a messaging platform. */
export interface ChannelAdapter {
  readonly id: string;
  readonly label: string;
  readonly maxTextLength: number;

  start(handler: MessageHandler, signal: AbortSignal): Promise<void>;
  stop(): Promise<void>;

  sendText(params: SendTextParams): Promise<{ messageId: string }>;
  sendDocument(params: SendDocumentParams): Promise<{ messageId: string }>;
  sendTyping(params: { to: string }): Promise<void>;
  downloadDocument(fileId: string): Promise<Uint8Array>;
}
