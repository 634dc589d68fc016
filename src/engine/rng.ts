/**
 * Seeded Random Source
 *
 * xorshift128 over four uint32 words. The engine never seeds or owns one:
 * hosts and tests create a source and hand `next` to the tick as its draw
 * function. State is four plain numbers so a session can save and restore it
 * alongside a race snapshot.
 */

export type RandomState = readonly [number, number, number, number];

export class RandomSource {
  private s0: number;
  private s1: number;
  private s2: number;
  private s3: number;

  constructor(seed: number) {
    // Split one seed into four words
    this.s0 = seed >>> 0;
    this.s1 = (seed ^ 0xdeadbeef) >>> 0;
    this.s2 = (seed ^ 0x12345678) >>> 0;
    this.s3 = (seed ^ 0xcafebabe) >>> 0;
  }

  /** Next unsigned 32-bit draw. */
  next = (): number => {
    const t = this.s1 << 9;
    const r = this.s0 ^ t;
    this.s0 = this.s1;
    this.s1 = this.s2;
    this.s2 = this.s3;
    this.s3 = (this.s3 ^ (this.s3 >>> 11) ^ (r ^ (r >>> 8))) >>> 0;
    return this.s3;
  };

  snapshot(): RandomState {
    return [this.s0, this.s1, this.s2, this.s3];
  }

  restore(state: RandomState): void {
    [this.s0, this.s1, this.s2, this.s3] = state.map((word) => word >>> 0);
  }
}

export function createRandomSource(seed: number): RandomSource {
  return new RandomSource(seed);
}
