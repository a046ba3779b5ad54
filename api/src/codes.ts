import { DuplicateCodeError } from './errors.js';
import { cryptoRandom, type RandomSource } from './random.js';

const ALPHANUMERIC = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';
const LETTERS = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ';
const DIGITS = '0123456789';

export const CONFIRMATION_NUMBER_PATTERN = /^[A-Z0-9]{6}$/;
export const TRACKING_NUMBER_PATTERN = /^[A-Z]{3}[0-9]{6}$/;

export class CodeGenerator {
  constructor(private readonly random: RandomSource = cryptoRandom) {}

  /** 6 characters over [A-Z0-9]. */
  generateConfirmationNumber(): string {
    return this.draw(ALPHANUMERIC, 6);
  }

  /** 3 letters followed by 6 digits, e.g. `KQZ042317`. */
  generateTrackingNumber(): string {
    return this.draw(LETTERS, 3) + this.draw(DIGITS, 6);
  }

  // Opaque display token; nothing verifies it at the gate.
  generateBoardingQrPayload(confirmationNumber: string): string {
    const suffix = this.random.bytes(8).toString('hex').toUpperCase();
    return `QR-${confirmationNumber}-${suffix}`;
  }

  private draw(alphabet: string, length: number): string {
    let out = '';
    for (let i = 0; i < length; i++) {
      out += alphabet[this.random.int(alphabet.length)];
    }
    return out;
  }
}

/**
 * Runs `persist` with freshly generated codes until one is accepted by the
 * store. Only `DuplicateCodeError` triggers a retry.
 */
export async function withUniqueCode<T>(
  generate: () => string,
  persist: (code: string) => Promise<T>,
  maxAttempts: number,
  onExhausted: (attempts: number) => Error,
  onCollision?: (code: string, attempt: number) => void
): Promise<T> {
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    const code = generate();
    try {
      return await persist(code);
    } catch (err) {
      if (!(err instanceof DuplicateCodeError)) {
        throw err;
      }
      onCollision?.(code, attempt);
    }
  }
  throw onExhausted(maxAttempts);
}
