export interface Rng {
  readonly seed: number;
  next(): number;
  /** Uniform integer in [min, max], both inclusive. */
  int(min: number, max: number): number;
  pick<T>(values: readonly T[]): T;
  /** Draws `count` distinct elements, in draw order. */
  sample<T>(values: readonly T[], count: number): T[];
  shuffle<T>(values: readonly T[]): T[];
  token(length: number): string;
}

const TOKEN_ALPHABET = '0123456789abcdefghijklmnopqrstuvwxyz';

export function hashSeed(input: string): number {
  let hash = 2166136261;
  for (let i = 0; i < input.length; i++) {
    hash ^= input.charCodeAt(i);
    hash = Math.imul(hash, 16777619);
  }
  return hash >>> 0;
}

function mulberry32(seed: number): () => number {
  let t = seed >>> 0;
  return () => {
    t += 0x6d2b79f5;
    let r = Math.imul(t ^ (t >>> 15), t | 1);
    r ^= r + Math.imul(r ^ (r >>> 7), r | 61);
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
  };
}

export function createRng(seed: string | number): Rng {
  const base = typeof seed === 'number' ? seed >>> 0 : hashSeed(seed);
  const next = mulberry32(base);

  const int = (min: number, max: number): number => {
    const low = Math.ceil(min);
    const high = Math.floor(max);
    if (high < low) {
      throw new RangeError(`int() called with an empty range [${String(min)}, ${String(max)}]`);
    }
    return Math.floor(next() * (high - low + 1)) + low;
  };

  const shuffle = <T>(values: readonly T[]): T[] => {
    const copy = [...values];
    for (let i = copy.length - 1; i > 0; i--) {
      const j = Math.floor(next() * (i + 1));
      [copy[i], copy[j]] = [copy[j], copy[i]];
    }
    return copy;
  };

  return {
    seed: base,
    next,
    int,
    pick<T>(values: readonly T[]): T {
      if (values.length === 0) {
        throw new RangeError('pick() called with an empty array');
      }
      return values[Math.floor(next() * values.length)];
    },
    sample<T>(values: readonly T[], count: number): T[] {
      if (count > values.length) {
        throw new RangeError(
          `sample() asked for ${String(count)} of ${String(values.length)} values`,
        );
      }
      // Partial Fisher-Yates: only the first `count` slots are settled.
      const pool = [...values];
      for (let i = 0; i < count; i++) {
        const j = i + Math.floor(next() * (pool.length - i));
        [pool[i], pool[j]] = [pool[j], pool[i]];
      }
      return pool.slice(0, count);
    },
    shuffle,
    token(length: number): string {
      let out = '';
      for (let i = 0; i < length; i++) {
        out += TOKEN_ALPHABET[Math.floor(next() * TOKEN_ALPHABET.length)];
      }
      return out;
    },
  };
}
