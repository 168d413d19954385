import type { Receipt } from '@billmirror/billing-domain';
import { InMemoryBillingStore } from '@billmirror/billing-domain/testing';
import { type Logger, noopLogger } from '@billmirror/domain-kernel';
import { createTransport } from 'nodemailer';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import {
  LoggingReceiptSender,
  SmtpReceiptSender,
  renderReceipt,
} from '../infrastructure/receipt-senders.js';

const RECEIPT_TEXT = [
  'Thank you for your payment.',
  '',
  'Amount: 9.99 USD',
  'Charge: ch_1',
  'Date: 2013-01-01',
  'Card: Visa ending in 4242',
  'Description: Monthly plan',
  '',
].join('\n');

describe('receipt senders', () => {
  let receipt: Receipt;

  beforeEach(async () => {
    const store = new InMemoryBillingStore();
    const customer = await store.customers.upsert({
      stripeId: 'cus_1',
      email: 'member@example.test',
      cardKind: 'Visa',
      cardLast4: '4242',
      cardFingerprint: 'fp_test',
    });
    const charge = await store.charges.upsert({
      stripeId: 'ch_1',
      customerId: customer.id,
      currency: 'usd',
      amount: 999,
      description: 'Monthly plan',
      chargeCreated: new Date('2013-01-01T12:00:00Z'),
    });
    receipt = { charge, customer, to: 'member@example.test' };
  });

  it('renders the receipt body', () => {
    expect(renderReceipt(receipt)).toEqual({
      subject: 'Payment receipt: 9.99 USD',
      text: RECEIPT_TEXT,
    });
  });

  it('leaves out the lines it has no data for', () => {
    const bare = {
      ...receipt,
      charge: { ...receipt.charge, chargeCreated: null, description: '' },
      customer: { ...receipt.customer, cardLast4: '' },
    };
    expect(renderReceipt(bare).text).toBe(
      'Thank you for your payment.\n\nAmount: 9.99 USD\nCharge: ch_1\n',
    );
  });

  it('mails the receipt over the transport', async () => {
    const transport = createTransport({ jsonTransport: true });
    const sendMail = vi.spyOn(transport, 'sendMail');
    const sender = new SmtpReceiptSender(
      { host: 'smtp.example.test', port: 587, secure: false, from: 'billing@example.test' },
      transport,
    );

    await sender.sendReceipt(receipt);

    expect(sendMail).toHaveBeenCalledWith({
      from: 'billing@example.test',
      to: 'member@example.test',
      subject: 'Payment receipt: 9.99 USD',
      text: RECEIPT_TEXT,
    });
  });

  it('logs the receipt when no mail server is configured', async () => {
    const info = vi.fn();
    const logger: Logger = { ...noopLogger, info };

    await new LoggingReceiptSender(logger).sendReceipt(receipt);

    expect(info).toHaveBeenCalledWith(
      { to: 'member@example.test', chargeId: 'ch_1', subject: 'Payment receipt: 9.99 USD' },
      'Receipt',
    );
  });
});
