import { Decimal } from 'decimal.js';
import { describe, expect, it } from 'vitest';
import { demoCard, SimulatedPaymentGateway, validateCard, type SimulatedPaymentOptions } from '../src/payment.js';
import type { CardInfo } from '../src/types.js';
import { NOW, silentLogger } from './helpers/fixtures.js';
import { scriptedRandom } from './helpers/random.js';

const card: CardInfo = {
  cardNumber: '4111 1111-1111 1111',
  cardHolderName: 'Ada Lovelace',
  expiryMonth: 3,
  expiryYear: 2030,
  cvv: '123'
};

const gateway = (options: Partial<SimulatedPaymentOptions> = {}) =>
  new SimulatedPaymentGateway(
    {
      successRate: 1,
      refundSuccessRate: 1,
      latencyMs: 0,
      random: scriptedRandom([0], 0xab),
      clock: () => NOW,
      ...options
    },
    silentLogger
  );

describe('validateCard', () => {
  const amount = new Decimal('10.00');

  it('accepts a card expiring this month with separators in the number', () => {
    expect(validateCard(amount, card, NOW)).toBe(true);
  });

  it('accepts the demo card', () => {
    expect(validateCard(amount, demoCard('user-1', NOW), NOW)).toBe(true);
  });

  it.each<[string, Partial<CardInfo>]>([
    ['a short card number', { cardNumber: '411111111111' }],
    ['a blank holder', { cardHolderName: '  ' }],
    ['month 13', { expiryMonth: 13 }],
    ['an expired card', { expiryMonth: 2 }],
    ['a non-numeric cvv', { cvv: '12a' }]
  ])('rejects %s', (_label, override) => {
    expect(validateCard(amount, { ...card, ...override }, NOW)).toBe(false);
  });

  it('rejects a zero amount', () => {
    expect(validateCard(new Decimal(0), card, NOW)).toBe(false);
  });
});

describe('SimulatedPaymentGateway', () => {
  it('returns a transaction id built from the clock and random bytes', async () => {
    const result = await gateway().charge(new Decimal('1049.97'), card);
    expect(result).toEqual({
      success: true,
      transactionId: 'TXN_1899374400_abababab',
      amount: new Decimal('1049.97'),
      processedAt: NOW
    });
  });

  it('reports invalid card data as a failed result', async () => {
    const result = await gateway().charge(new Decimal('10'), { ...card, cvv: '' });
    expect(result).toEqual({ success: false, errorMessage: 'Invalid payment information' });
  });

  it('declines when the draw misses the success rate', async () => {
    const declined = await gateway({ successRate: 0.9, random: scriptedRandom([9000]) }).charge(new Decimal('10'), card);
    expect(declined).toEqual({ success: false, errorMessage: 'Payment was declined by the bank' });

    const approved = await gateway({ successRate: 0.9, random: scriptedRandom([8999]) }).charge(new Decimal('10'), card);
    expect(approved.success).toBe(true);
  });

  it('validates refund requests', async () => {
    const payments = gateway();
    expect(await payments.refund('', new Decimal('10'))).toEqual({
      success: false,
      errorMessage: 'Invalid refund request'
    });
    expect(await payments.refund('TXN_1_00000000', new Decimal(0))).toEqual({
      success: false,
      errorMessage: 'Invalid refund request'
    });
  });

  it('can decline a refund', async () => {
    const result = await gateway({ refundSuccessRate: 0 }).refund('TXN_1_00000000', new Decimal('10'));
    expect(result).toEqual({ success: false, errorMessage: 'Refund was declined' });
  });

  it('refunds the requested amount', async () => {
    const result = await gateway().refund('TXN_1_00000000', new Decimal('10'));
    expect(result).toEqual({
      success: true,
      transactionId: 'TXN_1_00000000',
      amount: new Decimal('10'),
      processedAt: NOW
    });
  });
});

describe('demoCard', () => {
  it('expires in December two years out', () => {
    expect(demoCard('user-1', NOW)).toEqual({
      cardNumber: '4111111111111111',
      cardHolderName: 'user-1 Demo',
      expiryMonth: 12,
      expiryYear: 2032,
      cvv: '123'
    });
  });
});
