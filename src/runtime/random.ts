const MASK_FALLBACK = 0xa5a5a5a5a5a5a5a5n;
const MULTIPLIER = 0x2545f4914f6cdd1dn;

/** xorshift64* generator behind `Math.random`; the same seed gives the same sequence. */
export class SeededRandom {
  private state: bigint;

  constructor(seed: number | bigint) {
    this.state = SeededRandom.initialState(seed);
  }

  private static initialState(seed: number | bigint): bigint {
    const state = BigInt.asUintN(64, BigInt(seed));
    return state === 0n ? MASK_FALLBACK : state;
  }

  reseed(seed: number | bigint): void {
    this.state = SeededRandom.initialState(seed);
  }

  /** Float in [0, 1) built from the top 53 bits of the output. */
  next(): number {
    let x = this.state;
    x ^= x >> 12n;
    x = BigInt.asUintN(64, x ^ (x << 25n));
    x ^= x >> 27n;
    this.state = x === 0n ? MASK_FALLBACK : x;
    const out = BigInt.asUintN(64, x * MULTIPLIER);
    return Number(out >> 11n) / 2 ** 53;
  }
}
