// src/services/notifier.ts
import type { Transporter } from 'nodemailer';
import { ServiceUnavailableError } from '../utils/errors';
import { Clock, systemClock } from '../utils/clock';

/**
 * Out-of-band delivery of a passcode to whoever controls the email address.
 */
export interface Notifier {
  sendPasscode(email: string, code: string, expiresAt: number): Promise<void>;
}

/**
 * Development stand-in: the code goes to the server log, never to the client.
 */
export class ConsoleNotifier implements Notifier {
  async sendPasscode(email: string, code: string, expiresAt: number): Promise<void> {
    console.log(`📨 [dev] Passcode for ${email}: ${code} (expires ${new Date(expiresAt * 1000).toISOString()})`);
  }
}

export class EmailNotifier implements Notifier {
  constructor(
    private readonly transporter: Pick<Transporter, 'sendMail'>,
    private readonly from: string,
    private readonly clock: Clock = systemClock
  ) {}

  async sendPasscode(email: string, code: string, expiresAt: number): Promise<void> {
    const minutes = Math.max(1, Math.round((expiresAt - this.clock()) / 60));
    try {
      const info = await this.transporter.sendMail({
        from: this.from,
        to: email,
        subject: 'Your sign-in code',
        text: `Your sign-in code is ${code}. It expires in ${minutes} minutes.\n\nIf you did not request it, you can ignore this email.`,
        html: `
          <div style="font-family: Arial, sans-serif; max-width: 600px; margin: 0 auto; padding: 20px;">
            <h2 style="color: #1976d2; text-align: center;">Your sign-in code</h2>
            <p style="font-size: 32px; letter-spacing: 8px; text-align: center; font-weight: bold;">${code}</p>
            <p>This code expires in ${minutes} minutes.</p>
            <p style="color: #999; font-size: 12px;">If you did not request this email, you can safely ignore it.</p>
          </div>
        `,
      });
      console.log('Passcode email sent:', info.messageId);
    } catch (error) {
      console.error('Failed to send passcode email:', error);
      throw new ServiceUnavailableError('Failed to send passcode email');
    }
  }
}
