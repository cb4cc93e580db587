/**
 * MINSTD0 linear congruential engine (x' = 16807 * x mod 2^31 - 1).
 *
 * Uniform integer draws use downscaling with rejection, so a given seed
 * always yields the same sequence of target labels.
 */

const MODULUS = 2147483647;
const MULTIPLIER = 16807;
const MIN = 1;
const MAX = MODULUS - 1;

export class Minstd0 {
  private state: number;

  constructor(seed: number) {
    const reduced = ((Math.trunc(seed) % MODULUS) + MODULUS) % MODULUS;
    this.state = reduced === 0 ? 1 : reduced;
  }

  next(): number {
    // 16807 * (2^31 - 2) stays well below 2^53
    this.state = (this.state * MULTIPLIER) % MODULUS;
    return this.state;
  }

  /**
   * Draw an integer uniformly from [low, high]
   */
  uniformInt(low: number, high: number): number {
    if (high < low) {
      throw new RangeError(`Invalid range [${low}, ${high}]`);
    }

    const engineRange = MAX - MIN;
    const bucketCount = high - low + 1;
    const scaling = Math.floor(engineRange / bucketCount);
    const past = bucketCount * scaling;

    let value: number;
    do {
      value = this.next() - MIN;
    } while (value >= past);

    return Math.floor(value / scaling) + low;
  }
}

/**
 * 8-bit XOR fold of the UTF-8 bytes of a string
 */
export function xorFold(text: string): number {
  let hash = 0;
  for (const byte of Buffer.from(text, "utf8")) {
    hash ^= byte;
  }
  return hash;
}
