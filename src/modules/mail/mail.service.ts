import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import nodemailer, { Transporter } from 'nodemailer';

export interface MailConfig {
  host?: string;
  port: number;
  secure: boolean;
  user?: string;
  password?: string;
  from: string;
}

export function loadMailConfig(config: ConfigService): MailConfig {
  const port = Number(config.get<string>('MAIL_PORT', '587'));
  return {
    host: config.get<string>('MAIL_HOST') || undefined,
    port: Number.isInteger(port) && port > 0 ? port : 587,
    secure: config.get<string>('MAIL_SECURE', 'false').trim().toLowerCase() === 'true',
    user: config.get<string>('MAIL_USER') || undefined,
    password: config.get<string>('MAIL_PASSWORD') || undefined,
    from: config.get<string>('MAIL_FROM', 'noreply@reviews.local'),
  };
}

/**
 * Outbound mail. Without MAIL_HOST the message is rendered by nodemailer's
 * JSON transport and written to the log instead of being sent.
 */
@Injectable()
export class MailService {
  private readonly logger = new Logger(MailService.name);
  private readonly cfg: MailConfig;
  private readonly transporter: Transporter;

  constructor(config: ConfigService) {
    this.cfg = loadMailConfig(config);
    this.transporter = this.cfg.host
      ? nodemailer.createTransport({
          host: this.cfg.host,
          port: this.cfg.port,
          secure: this.cfg.secure,
          auth:
            this.cfg.user && this.cfg.password
              ? { user: this.cfg.user, pass: this.cfg.password }
              : undefined,
        })
      : nodemailer.createTransport({ jsonTransport: true });
  }

  /** Resolves to false instead of throwing when delivery fails. */
  async send(to: string, subject: string, body: string): Promise<boolean> {
    try {
      await this.transporter.sendMail({
        from: this.cfg.from,
        to,
        subject,
        text: body,
      });
      if (!this.cfg.host) {
        this.logger.log(`Mail not sent (no MAIL_HOST), rendered to ${to}: ${body}`);
      } else {
        this.logger.debug(`Mail "${subject}" delivered to ${to}`);
      }
      return true;
    } catch (error) {
      const msg = error instanceof Error ? error.message : String(error);
      this.logger.error(`Failed to send "${subject}" to ${to}: ${msg}`);
      return false;
    }
  }
}
