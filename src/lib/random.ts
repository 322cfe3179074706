export interface RandomSource {
  /** A float in [0, 1). */
  next(): number;
}

export const defaultRandom: RandomSource = {
  next: () => Math.random(),
};

export function randomInt(random: RandomSource, min: number, max: number) {
  return min + Math.floor(random.next() * (max - min + 1));
}

export function pickOne<T>(random: RandomSource, items: readonly T[]): T {
  if (items.length === 0) {
    throw new Error("pickOne requires at least one item");
  }
  const index = Math.min(items.length - 1, Math.floor(random.next() * items.length));
  return items[index];
}

/**
 * Draws `count` distinct items in draw order.
 */
export function sampleItems<T>(random: RandomSource, items: readonly T[], count: number): T[] {
  const pool = [...items];
  const size = Math.max(0, Math.min(count, pool.length));
  const picked: T[] = [];
  for (let i = 0; i < size; i += 1) {
    const index = Math.min(pool.length - 1, Math.floor(random.next() * pool.length));
    picked.push(pool[index]);
    pool.splice(index, 1);
  }
  return picked;
}
