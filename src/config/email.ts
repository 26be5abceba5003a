// src/config/email.ts
import nodemailer, { Transporter } from 'nodemailer';
import { EmailConfig } from './env';

/**
 * Build the SMTP transport. The connection check is skipped under test so a
 * missing mail server never blocks the suite.
 */
export const createMailTransport = (config: EmailConfig, verify: boolean): Transporter => {
  const transporter = nodemailer.createTransport({
    host: config.host,
    port: config.port,
    secure: config.secure,
    auth: config.user ? { user: config.user, pass: config.password } : undefined,
  });

  if (verify) {
    transporter.verify((error) => {
      if (error) {
        console.error('Email transporter configuration error:', error);
      } else {
        console.log('✅ Email server is ready to take our messages');
      }
    });
  }

  return transporter;
};
