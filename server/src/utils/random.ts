/** Uniform source in [0, 1), same contract as Math.random. */
export type RandomSource = () => number

export const defaultRandom: RandomSource = () => Math.random()

/** Integer in [min, max], both ends inclusive. */
export function randomInt(random: RandomSource, min: number, max: number): number {
  return min + Math.floor(random() * (max - min + 1))
}

/** Float in [min, max). */
export function randomUniform(random: RandomSource, min: number, max: number): number {
  return min + (max - min) * random()
}

/** `count` distinct items in draw order (partial Fisher-Yates on a copy). */
export function sample<T>(random: RandomSource, items: readonly T[], count: number): T[] {
  const pool = [...items]
  const n = Math.min(count, pool.length)
  for (let i = 0; i < n; i++) {
    const j = randomInt(random, i, pool.length - 1)
    const picked = pool[j]
    pool[j] = pool[i]
    pool[i] = picked
  }
  return pool.slice(0, n)
}

/** Deterministic source (mulberry32) for tests and reproducible mock data. */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0
  return () => {
    state = (state + 0x6d2b79f5) >>> 0
    let t = state
    t = Math.imul(t ^ (t >>> 15), t | 1)
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61)
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }
}

export function roundTo2(value: number): number {
  return Math.round(value * 100) / 100
}
