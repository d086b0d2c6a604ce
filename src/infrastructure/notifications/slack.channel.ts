import { Logger } from '../../shared/logger';
import {
  IHttpClient,
  INotificationChannel,
  NotificationMessage,
} from '../../domain/interfaces/services.interface';

export class SlackWebhookChannel implements INotificationChannel {
  public readonly name = 'slack';
  private readonly logger = new Logger('SlackWebhookChannel');

  constructor(
    private readonly http: IHttpClient,
    private readonly webhookUrl?: string,
  ) {}

  async send(message: NotificationMessage): Promise<boolean> {
    if (!this.webhookUrl) {
      this.logger.debug('SLACK_WEBHOOK_URL not set');
      return false;
    }
    const response = await this.http.postJson(this.webhookUrl, { text: `*${message.title}*\n${message.body}` });
    if (!response.ok) {
      this.logger.warn(`Slack webhook returned HTTP ${response.status}`);
    }
    return response.ok;
  }
}
