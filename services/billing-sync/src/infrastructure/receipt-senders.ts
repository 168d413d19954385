import { type Receipt, type ReceiptSender, formatAmount } from '@billmirror/billing-domain';
import type { Logger } from '@billmirror/domain-kernel';
import { type Transporter, createTransport } from 'nodemailer';
import type { SmtpSettings } from '../config.js';

export interface ReceiptMessage {
  subject: string;
  text: string;
}

export function renderReceipt({ charge, customer }: Receipt): ReceiptMessage {
  const amount = `${formatAmount(charge.amount, charge.currency)} ${charge.currency.toUpperCase()}`;
  const lines = [
    'Thank you for your payment.',
    '',
    `Amount: ${amount}`,
    `Charge: ${charge.stripeId}`,
  ];
  if (charge.chargeCreated) lines.push(`Date: ${charge.chargeCreated.toISOString().slice(0, 10)}`);
  if (customer.cardKind && customer.cardLast4) {
    lines.push(`Card: ${customer.cardKind} ending in ${customer.cardLast4}`);
  }
  if (charge.description) lines.push(`Description: ${charge.description}`);

  return { subject: `Payment receipt: ${amount}`, text: `${lines.join('\n')}\n` };
}

export class SmtpReceiptSender implements ReceiptSender {
  private readonly transporter: Transporter;

  constructor(
    private readonly settings: SmtpSettings,
    transporter?: Transporter,
  ) {
    this.transporter =
      transporter ??
      createTransport({
        host: settings.host,
        port: settings.port,
        secure: settings.secure,
        auth: settings.user ? { user: settings.user, pass: settings.pass } : undefined,
      });
  }

  async sendReceipt(receipt: Receipt): Promise<void> {
    const message = renderReceipt(receipt);
    await this.transporter.sendMail({
      from: this.settings.from,
      to: receipt.to,
      subject: message.subject,
      text: message.text,
    });
  }
}

/** Used when no SMTP host is configured. */
export class LoggingReceiptSender implements ReceiptSender {
  constructor(private readonly logger: Logger) {}

  async sendReceipt(receipt: Receipt): Promise<void> {
    const { subject } = renderReceipt(receipt);
    this.logger.info({ to: receipt.to, chargeId: receipt.charge.stripeId, subject }, 'Receipt');
  }
}
