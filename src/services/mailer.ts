import { existsSync } from "fs";
import { basename } from "path";
import nodemailer, { type Transporter } from "nodemailer";
import type SMTPTransport from "nodemailer/lib/smtp-transport";
import type { EmailConfig } from "../core/config-schema";
import { errorMessage } from "../core/errors";
import type { Draft } from "../pipeline/types";

export type SendOutcome =
  | { ok: true; messageId: string }
  | { ok: false; error: string };

export interface MailTransport {
  send(draft: Draft): Promise<SendOutcome>;
}

export interface SmtpOptions {
  email: EmailConfig;
  password: string;
  /** Attached to every message when the file exists. */
  attachmentPath?: string;
}

/**
 * SMTP delivery through nodemailer. Failures are reported in the outcome,
 * never thrown.
 */
export class SmtpTransport implements MailTransport {
  private readonly transporter: Transporter<SMTPTransport.SentMessageInfo>;

  constructor(private readonly options: SmtpOptions) {
    const { email, password } = options;
    this.transporter = nodemailer.createTransport({
      host: email.smtp_host,
      port: email.smtp_port,
      secure: email.secure,
      auth: { user: email.user, pass: password },
      connectionTimeout: email.timeout_ms,
      greetingTimeout: email.timeout_ms,
      socketTimeout: email.timeout_ms,
    });
  }

  async send(draft: Draft): Promise<SendOutcome> {
    const { email, attachmentPath } = this.options;
    const attachments = attachmentPath && existsSync(attachmentPath)
      ? [{ filename: basename(attachmentPath), path: attachmentPath }]
      : undefined;
    if (attachmentPath && !attachments) {
      console.warn(`⚠️ [Mail] Attachment not found, sending without it: ${attachmentPath}`);
    }

    try {
      const info = await this.transporter.sendMail({
        from: `"${email.sender_name}" <${email.user}>`,
        to: draft.recipient,
        subject: draft.subject,
        text: draft.body,
        attachments,
      });
      return { ok: true, messageId: info.messageId };
    } catch (err) {
      return { ok: false, error: errorMessage(err) };
    }
  }
}
