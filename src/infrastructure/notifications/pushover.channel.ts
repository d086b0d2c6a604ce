import { Logger } from '../../shared/logger';
import {
  IHttpClient,
  INotificationChannel,
  NotificationMessage,
} from '../../domain/interfaces/services.interface';

export const PUSHOVER_MESSAGES_URL = 'https://api.pushover.net/1/messages.json';

export interface PushoverCredentials {
  userKey?: string;
  appToken?: string;
}

export class PushoverChannel implements INotificationChannel {
  public readonly name = 'pushover';
  private readonly logger = new Logger('PushoverChannel');

  constructor(
    private readonly http: IHttpClient,
    private readonly credentials: PushoverCredentials,
  ) {}

  async send(message: NotificationMessage): Promise<boolean> {
    const { userKey, appToken } = this.credentials;
    if (!userKey || !appToken) {
      this.logger.debug('PUSHOVER_USER_KEY / PUSHOVER_APP_TOKEN not set');
      return false;
    }
    const response = await this.http.postForm(PUSHOVER_MESSAGES_URL, {
      token: appToken,
      user: userKey,
      title: message.title,
      message: message.body,
    });
    return response.ok;
  }
}
