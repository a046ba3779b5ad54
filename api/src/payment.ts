import { setTimeout as sleep } from 'node:timers/promises';
import { Decimal } from 'decimal.js';
import type { Logger } from './logger.js';
import { chance, cryptoRandom, type RandomSource } from './random.js';
import type { CardInfo } from './types.js';

export type PaymentResult =
  | { success: true; transactionId: string; amount: Decimal; processedAt: Date }
  | { success: false; errorMessage: string };

export interface PaymentGateway {
  charge(amount: Decimal, card: CardInfo, description?: string): Promise<PaymentResult>;
  refund(transactionId: string, amount: Decimal): Promise<PaymentResult>;
}

export type SimulatedPaymentOptions = {
  successRate: number;
  refundSuccessRate: number;
  latencyMs: number;
  random?: RandomSource;
  clock?: () => Date;
};

export function validateCard(amount: Decimal, card: CardInfo, now: Date): boolean {
  if (amount.lte(0)) return false;
  if (!/^\d{13,19}$/.test(card.cardNumber.replace(/[\s-]/g, ''))) return false;
  if (card.cardHolderName.trim() === '') return false;
  if (!Number.isInteger(card.expiryMonth) || card.expiryMonth < 1 || card.expiryMonth > 12) return false;
  const year = now.getUTCFullYear();
  const month = now.getUTCMonth() + 1;
  if (card.expiryYear < year || (card.expiryYear === year && card.expiryMonth < month)) return false;
  return /^\d{3,4}$/.test(card.cvv);
}

/**
 * Stand-in for a card processor. Declines are returned, never thrown.
 */
export class SimulatedPaymentGateway implements PaymentGateway {
  private readonly random: RandomSource;
  private readonly clock: () => Date;

  constructor(
    private readonly options: SimulatedPaymentOptions,
    private readonly logger: Logger
  ) {
    this.random = options.random ?? cryptoRandom;
    this.clock = options.clock ?? (() => new Date());
  }

  async charge(amount: Decimal, card: CardInfo, description?: string): Promise<PaymentResult> {
    this.logger.info({ amount: amount.toFixed(2), description }, 'Processing payment');
    await this.simulateLatency(this.options.latencyMs);

    if (!validateCard(amount, card, this.clock())) {
      return { success: false, errorMessage: 'Invalid payment information' };
    }

    if (!chance(this.random, this.options.successRate)) {
      this.logger.warn({ amount: amount.toFixed(2) }, 'Payment declined');
      return { success: false, errorMessage: 'Payment was declined by the bank' };
    }

    const transactionId = this.transactionId();
    this.logger.info({ transactionId }, 'Payment processed');
    return { success: true, transactionId, amount, processedAt: this.clock() };
  }

  async refund(transactionId: string, amount: Decimal): Promise<PaymentResult> {
    this.logger.info({ transactionId, amount: amount.toFixed(2) }, 'Processing refund');
    await this.simulateLatency(this.options.latencyMs / 2);

    if (transactionId.trim() === '' || amount.lte(0)) {
      return { success: false, errorMessage: 'Invalid refund request' };
    }

    if (!chance(this.random, this.options.refundSuccessRate)) {
      this.logger.warn({ transactionId }, 'Refund declined');
      return { success: false, errorMessage: 'Refund was declined' };
    }

    return { success: true, transactionId, amount, processedAt: this.clock() };
  }

  private transactionId(): string {
    const seconds = Math.floor(this.clock().getTime() / 1000);
    return `TXN_${seconds}_${this.random.bytes(4).toString('hex')}`;
  }

  private async simulateLatency(ms: number) {
    if (ms > 0) {
      await sleep(ms);
    }
  }
}

export function demoCard(userId: string, now: Date): CardInfo {
  return {
    cardNumber: '4111111111111111',
    cardHolderName: `${userId} Demo`,
    expiryMonth: 12,
    expiryYear: now.getUTCFullYear() + 2,
    cvv: '123'
  };
}
