import { Logger } from '../../shared/logger';
import {
  INotificationChannel,
  INotificationService,
  NotificationMessage,
} from '../../domain/interfaces/services.interface';

export type ConsoleWriter = (text: string) => void;

const writeStdout: ConsoleWriter = (text) => {
  process.stdout.write(`${text}\n`);
};

/**
 * Offers each message to every enabled channel. A channel error is logged and
 * counted as not delivered; when nothing was delivered the message goes to stdout.
 */
export class NotificationService implements INotificationService {
  private readonly logger = new Logger(NotificationService.name);

  constructor(
    private readonly channels: readonly INotificationChannel[],
    private readonly writeFallback: ConsoleWriter = writeStdout,
  ) {}

  public async notifyBatch(title: string, lines: readonly string[]): Promise<void> {
    await this.notify({ title, body: lines.join('\n') });
  }

  public async notify(message: NotificationMessage): Promise<void> {
    let sent = false;

    for (const channel of this.channels) {
      try {
        const delivered = await channel.send(message);
        if (delivered) {
          this.logger.info(`Notification sent via ${channel.name}: ${message.title}`);
        }
        sent = delivered || sent;
      } catch (error) {
        this.logger.error(`Notification via ${channel.name} failed:`, error);
      }
    }

    if (!sent) {
      this.writeFallback(`${message.title}\n${message.body}`);
    }
  }
}
