import { ValidationError } from './errors';

/**
 * PI validation regex
 * PIs are ULIDs: 26 characters of Crockford's base32 alphabet
 */
export const PI_REGEX = /^[0-9A-HJKMNP-TV-Z]{26}$/;

/**
 * Crockford's Base32 alphabet (excludes I, L, O, U to avoid confusion)
 */
export const ENCODING = '0123456789ABCDEFGHJKMNPQRSTVWXYZ';

const TIME_LENGTH = 10;
const RANDOM_LENGTH = 16;

let lastTime = -1;
let lastRandom: number[] = [];

function randomDigits(): number[] {
  // 80 bits of randomness = 16 base32 digits; one byte per digit keeps it simple
  const bytes = new Uint8Array(RANDOM_LENGTH);
  crypto.getRandomValues(bytes);
  return Array.from(bytes, (b) => b & 0x1f);
}

/**
 * Increment a base32 digit array in place. Returns false on overflow.
 */
function increment(digits: number[]): boolean {
  for (let i = digits.length - 1; i >= 0; i--) {
    if (digits[i] < 31) {
      digits[i]++;
      return true;
    }
    digits[i] = 0;
  }
  return false;
}

/**
 * Generate a new ULID
 *
 * ULID format: TTTTTTTTTTRRRRRRRRRRRRRRRR
 * - 10 chars: timestamp (48 bits)
 * - 16 chars: randomness (80 bits)
 *
 * Within the same millisecond the random part is incremented instead of
 * redrawn, so ids generated by one process sort in generation order.
 */
export function ulid(now: number = Date.now()): string {
  let time = now;
  let timeStr = '';
  for (let i = TIME_LENGTH - 1; i >= 0; i--) {
    timeStr = ENCODING[time % 32] + timeStr;
    time = Math.floor(time / 32);
  }

  if (now !== lastTime || !increment(lastRandom)) {
    lastTime = now;
    lastRandom = randomDigits();
  }

  return timeStr + lastRandom.map((d) => ENCODING[d]).join('');
}

/**
 * Validate PI format
 */
export function isValidPi(value: string): boolean {
  return PI_REGEX.test(value);
}

/**
 * Validate PI and throw if invalid
 */
export function assertValidPi(value: string, label: string = 'PI'): void {
  if (!isValidPi(value)) {
    throw new ValidationError(
      `Invalid ${label}: must be 26-character ULID (got: ${value})`,
      { [label]: value }
    );
  }
}

/**
 * Two-level shard for pointer keys, taken from the first two characters.
 * Each level has at most 32 entries, bounding directory fan-out.
 *
 * Example: "01J8ME3H6FZ3KQ5W1P2XY8K7E5" -> ["0", "1"]
 */
export function shard2(pi: string): [string, string] {
  return [pi.slice(0, 1), pi.slice(1, 2)];
}

/**
 * Generate a PI (Persistent Identifier) for a new entity
 */
export function generatePi(): string {
  return ulid();
}
