import nodemailer, { Transporter } from 'nodemailer';
import { AppConfig } from '../config';
import { AppError, errorMessage } from '../utils/errors';

export interface Notification {
  recipients: string[];
  subject: string;
  body: string;
  reference: string;
}

export interface Notifier {
  notify(notification: Notification): Promise<void>;
}

/** Some recipients could not be reached; the rest were delivered. */
export class DeliveryError extends AppError {
  public readonly failedRecipients: string[];

  constructor(failedRecipients: string[], total: number, cause?: Error) {
    super(
      `Failed to deliver to ${failedRecipients.length} of ${total} recipients`,
      'DELIVERY_FAILED',
      502,
      { failedRecipients },
      cause
    );
    this.name = 'DeliveryError';
    this.failedRecipients = failedRecipients;
  }
}

export const createMailTransport = (mail: AppConfig['mail']): Transporter =>
  nodemailer.createTransport({
    host: mail.host,
    port: mail.port,
    secure: mail.secure,
    auth: mail.user ? { user: mail.user, pass: mail.pass } : undefined,
    connectionTimeout: 5000,
    greetingTimeout: 5000,
    socketTimeout: 10000
  });

/**
 * Sends one message per recipient, so one bad address never blocks the
 * others.
 */
export class EmailNotifier implements Notifier {
  constructor(
    private readonly transporter: Transporter,
    private readonly from: string
  ) {}

  async notify(notification: Notification): Promise<void> {
    const failed: string[] = [];
    let firstError: Error | undefined;

    for (const recipient of notification.recipients) {
      try {
        await this.transporter.sendMail({
          from: this.from,
          to: recipient,
          subject: notification.subject,
          text: `${notification.body}\n\n${notification.reference}`
        });
      } catch (error) {
        console.error(`❌ Failed to send email to ${recipient}: ${errorMessage(error)}`);
        failed.push(recipient);
        if (!firstError && error instanceof Error) {
          firstError = error;
        }
      }
    }

    console.log(
      `📧 Notification "${notification.subject}" delivered to ${notification.recipients.length - failed.length}/${notification.recipients.length} recipients`
    );

    if (failed.length > 0) {
      throw new DeliveryError(failed, notification.recipients.length, firstError);
    }
  }

  close(): void {
    this.transporter.close();
  }
}
