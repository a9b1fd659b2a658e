import nodemailer, { type SendMailOptions } from "nodemailer";
import type { Notification, NotificationChannel } from "./types.js";

export interface EmailSettings {
  host: string;
  port: number;
  username: string;
  password: string;
  from: string;
  to: string;
}

export interface MailTransport {
  sendMail(options: SendMailOptions): Promise<unknown>;
}

export function createSmtpTransport(settings: EmailSettings): MailTransport {
  const implicitTls = settings.port === 465;
  return nodemailer.createTransport({
    host: settings.host,
    port: settings.port,
    secure: implicitTls,
    requireTLS: !implicitTls,
    auth: { user: settings.username, pass: settings.password },
    connectionTimeout: 30000,
    greetingTimeout: 30000,
    socketTimeout: 30000,
  });
}

export function buildMail(settings: EmailSettings, notification: Notification): SendMailOptions {
  return {
    from: settings.from,
    to: settings.to,
    subject: notification.subject,
    text: notification.body,
  };
}

export function createEmailChannel(
  settings: EmailSettings,
  transport: MailTransport = createSmtpTransport(settings),
): NotificationChannel {
  return {
    name: "email",
    async send(notification) {
      await transport.sendMail(buildMail(settings, notification));
    },
  };
}
