import TelegramBot from 'node-telegram-bot-api';
import { Logger } from '../../shared/logger';
import { INotificationChannel, NotificationMessage } from '../../domain/interfaces/services.interface';

// Telegram rejects messages above 4096 characters.
const MAX_MESSAGE_LENGTH = 4000;

export type TelegramSender = Pick<TelegramBot, 'sendMessage'>;

export interface TelegramChannelOptions {
  token?: string;
  chatId?: string;
  /** Overrides the bot client; a polling-free `TelegramBot` is built from `token` otherwise. */
  sender?: TelegramSender;
}

export class TelegramChannel implements INotificationChannel {
  public readonly name = 'telegram';
  private readonly logger = new Logger('TelegramChannel');
  private readonly sender: TelegramSender | null;
  private readonly chatId: string | null;

  constructor(options: TelegramChannelOptions) {
    this.chatId = options.chatId || null;
    if (options.sender) {
      this.sender = options.sender;
    } else if (options.token) {
      this.sender = new TelegramBot(options.token, { polling: false });
    } else {
      this.sender = null;
    }
  }

  async send(message: NotificationMessage): Promise<boolean> {
    if (!this.sender || !this.chatId) {
      this.logger.debug('Telegram not configured (TELEGRAM_BOT_TOKEN / TELEGRAM_CHAT_ID)');
      return false;
    }

    for (const chunk of splitMessage(`${message.title}\n${message.body}`, MAX_MESSAGE_LENGTH)) {
      await this.sender.sendMessage(this.chatId, chunk, { disable_web_page_preview: true });
    }
    return true;
  }
}

/** Split on line boundaries so that every chunk fits `maxLength`; overlong lines are cut. */
export function splitMessage(text: string, maxLength: number): string[] {
  const chunks: string[] = [];
  let current = '';

  for (const line of text.split('\n')) {
    const pieces: string[] = [];
    for (let i = 0; i < Math.max(line.length, 1); i += maxLength) pieces.push(line.slice(i, i + maxLength));

    for (const piece of pieces) {
      const candidate = current ? `${current}\n${piece}` : piece;
      if (candidate.length > maxLength) {
        chunks.push(current);
        current = piece;
      } else {
        current = candidate;
      }
    }
  }

  if (current) chunks.push(current);
  return chunks;
}
