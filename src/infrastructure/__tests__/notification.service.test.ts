import { NotificationService } from '../services/notification.service';
import { SlackWebhookChannel } from '../notifications/slack.channel';
import { PushoverChannel, PUSHOVER_MESSAGES_URL } from '../notifications/pushover.channel';
import { EmailChannel } from '../notifications/email.channel';
import { splitMessage, TelegramChannel } from '../telegram/telegram.bot';
import { FakeHttpClient, jsonResponse } from '../../__tests__/helpers/http';
import { INotificationChannel, NotificationMessage } from '../../domain/interfaces/services.interface';

const message: NotificationMessage = { title: 'Stock Alerts', body: 'line 1\nline 2' };

function channel(name: string, send: () => Promise<boolean>): INotificationChannel {
  return { name, send };
}

describe('NotificationService', () => {
  it('falls back to the console writer when no channel delivers', async () => {
    const written: string[] = [];
    const service = new NotificationService(
      [
        channel('quiet', async () => false),
        channel('broken', async () => {
          throw new Error('boom');
        }),
      ],
      (text) => written.push(text),
    );

    await service.notifyBatch('Stock Alerts', ['line 1', 'line 2']);

    expect(written).toEqual(['Stock Alerts\nline 1\nline 2']);
  });

  it('keeps offering the message after a channel fails', async () => {
    const written: string[] = [];
    const delivered = jest.fn(async () => true);
    const service = new NotificationService(
      [
        channel('broken', async () => {
          throw new Error('boom');
        }),
        channel('ok', delivered),
      ],
      (text) => written.push(text),
    );

    await service.notify(message);

    expect(delivered).toHaveBeenCalledTimes(1);
    expect(written).toEqual([]);
  });
});

describe('SlackWebhookChannel', () => {
  it('posts a bold title followed by the body', async () => {
    const http = new FakeHttpClient(() => jsonResponse({}));
    await expect(new SlackWebhookChannel(http, 'https://hooks.test/T000').send(message)).resolves.toBe(true);
    expect(http.requests).toEqual([
      { method: 'POST_JSON', url: 'https://hooks.test/T000', body: { text: '*Stock Alerts*\nline 1\nline 2' } },
    ]);
  });

  it('does not send without a webhook URL', async () => {
    const http = new FakeHttpClient();
    await expect(new SlackWebhookChannel(http).send(message)).resolves.toBe(false);
    expect(http.requests).toHaveLength(0);
  });

  it('reports a failed webhook call as not delivered', async () => {
    const http = new FakeHttpClient(() => jsonResponse({}, 500));
    await expect(new SlackWebhookChannel(http, 'https://hooks.test/T000').send(message)).resolves.toBe(false);
  });
});

describe('PushoverChannel', () => {
  it('posts the form fields Pushover expects', async () => {
    const http = new FakeHttpClient(() => jsonResponse({ status: 1 }));
    const pushover = new PushoverChannel(http, { userKey: 'test-user', appToken: 'test-token' });

    await expect(pushover.send(message)).resolves.toBe(true);
    expect(http.requests).toEqual([
      {
        method: 'POST_FORM',
        url: PUSHOVER_MESSAGES_URL,
        body: { token: 'test-token', user: 'test-user', title: 'Stock Alerts', message: 'line 1\nline 2' },
      },
    ]);
  });

  it('needs both credentials', async () => {
    const http = new FakeHttpClient();
    await expect(new PushoverChannel(http, { userKey: 'test-user' }).send(message)).resolves.toBe(false);
    expect(http.requests).toHaveLength(0);
  });
});

describe('EmailChannel', () => {
  const smtp = {
    host: 'smtp.test',
    user: 'alerts@example.test',
    password: 'test-secret',
    to: 'desk@example.test',
  };

  it('mails the title as subject and the body as text', async () => {
    const sender = { sendMail: jest.fn().mockResolvedValue({}) };
    const email = new EmailChannel(smtp, sender);

    await expect(email.send(message)).resolves.toBe(true);
    expect(sender.sendMail).toHaveBeenCalledWith({
      from: 'alerts@example.test',
      to: 'desk@example.test',
      subject: 'Stock Alerts',
      text: 'line 1\nline 2',
    });
  });

  it('prefers the configured sender address', async () => {
    const sender = { sendMail: jest.fn().mockResolvedValue({}) };
    await new EmailChannel({ ...smtp, from: 'screener@example.test' }, sender).send(message);
    expect(sender.sendMail).toHaveBeenCalledWith(expect.objectContaining({ from: 'screener@example.test' }));
  });

  it('does not send without a password or a recipient', async () => {
    const sender = { sendMail: jest.fn() };
    await expect(new EmailChannel({ ...smtp, password: undefined }, sender).send(message)).resolves.toBe(false);
    await expect(new EmailChannel({ ...smtp, to: undefined }, sender).send(message)).resolves.toBe(false);
    expect(sender.sendMail).not.toHaveBeenCalled();
  });
});

describe('TelegramChannel', () => {
  it('sends the title and body to the configured chat', async () => {
    const sender = { sendMessage: jest.fn().mockResolvedValue({}) };
    const telegram = new TelegramChannel({ chatId: '12345', sender });

    await expect(telegram.send(message)).resolves.toBe(true);
    expect(sender.sendMessage).toHaveBeenCalledWith('12345', 'Stock Alerts\nline 1\nline 2', {
      disable_web_page_preview: true,
    });
  });

  it('does not send without a chat id', async () => {
    const sender = { sendMessage: jest.fn() };
    await expect(new TelegramChannel({ sender }).send(message)).resolves.toBe(false);
    expect(sender.sendMessage).not.toHaveBeenCalled();
  });
});

describe('splitMessage', () => {
  it('breaks on line boundaries', () => {
    expect(splitMessage('a\nb\nc', 3)).toEqual(['a\nb', 'c']);
  });

  it('cuts lines longer than the limit', () => {
    expect(splitMessage('abcdefg', 3)).toEqual(['abc', 'def', 'g']);
  });

  it('keeps a short message whole', () => {
    expect(splitMessage('title\nbody', 4000)).toEqual(['title\nbody']);
  });
});
