/**
 * Shared test fixtures
 */

/**
 * Deterministic uniform [0, 1) source (mulberry32)
 */
export function seededRandom(seed: number): () => number {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Records every angle written to it
 */
export class RecordingSink {
  readonly writes: Array<[number, number]> = [];
  readonly angles = new Map<number, number>();

  setParameter(position: number, angle: number): void {
    this.writes.push([position, angle]);
    this.angles.set(position, angle);
  }
}
