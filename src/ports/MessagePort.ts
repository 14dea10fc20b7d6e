export interface IncomingMessage {
  id: string;
  chatId: string; // Telegram chat ID
  senderId: string; // Falls back to the chat ID for channel posts
  text: string;
  timestamp: Date;
  fromBot: boolean;
}

export interface SendMessageOptions {
  /** Quote this message in the reply. */
  replyToMessageId?: string;
}

export type MessageHandler = (message: IncomingMessage) => Promise<void>;

export interface MessagePort {
  sendMessage(to: string, text: string, options?: SendMessageOptions): Promise<void>;
  onMessage(handler: MessageHandler): void;
}
