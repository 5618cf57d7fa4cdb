export type Rng = () => number;

export function normalizeSeed(seed?: number): number {
  if (typeof seed === "number" && Number.isFinite(seed)) {
    return seed | 0;
  }
  return 0x12345678;
}

// mulberry32
export function createRng(seed: number): Rng {
  let t = seed | 0;
  return () => {
    t |= 0;
    t = (t + 0x6d2b79f5) | 0;
    let r = Math.imul(t ^ (t >>> 15), 1 | t);
    r ^= r + Math.imul(r ^ (r >>> 7), 61 | r);
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
  };
}

export function seedFromString(value: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < value.length; i += 1) {
    hash ^= value.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash | 0;
}

export function pickWeighted<T extends string>(
  rng: Rng,
  keys: readonly T[],
  weights: Record<T, number>
): T {
  const entries = keys.filter((key) => weights[key] > 0);
  if (entries.length === 0) {
    throw new Error("pickWeighted needs at least one positive weight.");
  }
  const total = entries.reduce((sum, key) => sum + weights[key], 0);
  let roll = rng() * total;
  for (const key of entries) {
    roll -= weights[key];
    if (roll < 0) {
      return key;
    }
  }
  return entries[entries.length - 1];
}

export function pickOne<T>(rng: Rng, items: readonly T[]): T {
  if (items.length === 0) {
    throw new Error("pickOne needs a non-empty list.");
  }
  const index = Math.min(items.length - 1, Math.floor(rng() * items.length));
  return items[index];
}
