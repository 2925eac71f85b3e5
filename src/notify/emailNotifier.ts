import nodemailer, { type SendMailOptions } from "nodemailer";
import { archiveLogger } from "../logging.js";
import { DEFAULT_NOTIFY_TIMEOUT_MS, withTimeout, type Notifier } from "./notifier.js";

export interface MailTransport {
  sendMail(options: SendMailOptions): Promise<unknown>;
}

export interface SmtpOptions {
  host: string;
  port: number;
  secure: boolean;
  user: string | null;
  pass: string | null;
}

export function createSmtpTransport(smtp: SmtpOptions, timeoutMs: number): MailTransport {
  return nodemailer.createTransport({
    host: smtp.host,
    port: smtp.port,
    secure: smtp.secure,
    auth: smtp.user && smtp.pass ? { user: smtp.user, pass: smtp.pass } : undefined,
    connectionTimeout: timeoutMs,
    greetingTimeout: timeoutMs,
    socketTimeout: timeoutMs
  });
}

export class EmailNotifier implements Notifier {
  private readonly log = archiveLogger("notify");

  constructor(
    private readonly transport: MailTransport,
    private readonly opts: { sender: string; timeoutMs?: number }
  ) {}

  async send(address: string, subject: string, body: string): Promise<void> {
    const timeoutMs = this.opts.timeoutMs ?? DEFAULT_NOTIFY_TIMEOUT_MS;
    await withTimeout(
      this.transport.sendMail({ from: this.opts.sender, to: address, subject, html: body }),
      timeoutMs
    );
    this.log.info("Sent {subject} to {address}", { subject, address });
  }
}
