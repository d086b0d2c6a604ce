import { createTransport, SendMailOptions } from 'nodemailer';
import { Logger } from '../../shared/logger';
import { INotificationChannel, NotificationMessage, SmtpSettings } from '../../domain/interfaces/services.interface';

const SMTP_TIMEOUT_MS = 20000;
const DEFAULT_SMTP_PORT = 587;

export interface MailSender {
  sendMail(mail: SendMailOptions): Promise<unknown>;
}

export class EmailChannel implements INotificationChannel {
  public readonly name = 'email';
  private readonly logger = new Logger('EmailChannel');
  private readonly sender: MailSender | null;
  private readonly from: string | null;
  private readonly to: string | null;

  constructor(settings: SmtpSettings, sender?: MailSender) {
    const { host, port = DEFAULT_SMTP_PORT, user, password, tls = true } = settings;
    this.from = settings.from || user || null;
    this.to = settings.to || null;

    if (!host || !user || !password) {
      this.sender = null;
    } else if (sender) {
      this.sender = sender;
    } else {
      this.sender = createTransport({
        host,
        port,
        secure: false,
        requireTLS: tls,
        ignoreTLS: !tls,
        auth: { user, pass: password },
        connectionTimeout: SMTP_TIMEOUT_MS,
        socketTimeout: SMTP_TIMEOUT_MS,
      });
    }
  }

  async send(message: NotificationMessage): Promise<boolean> {
    if (!this.sender || !this.from || !this.to) {
      this.logger.debug('Email not configured (SMTP_HOST / SMTP_USER / SMTP_PASSWORD / MAIL_ADDRESS_NOTIFICATION_TO)');
      return false;
    }

    await this.sender.sendMail({
      from: this.from,
      to: this.to,
      subject: message.title,
      text: message.body,
    });
    return true;
  }
}
