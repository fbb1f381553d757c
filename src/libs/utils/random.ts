// Source of uniform numbers in [0, 1), injectable so tests can pin the draw
export type RandomSource = () => number

export function randomIndex(length: number, random: RandomSource = Math.random): number {
  return Math.min(length - 1, Math.floor(random() * length))
}

export function pickRandom<T>(items: readonly T[], random: RandomSource = Math.random): T {
  if (items.length === 0) {
    throw new RangeError('Cannot pick from an empty list')
  }
  return items[randomIndex(items.length, random)]
}

// Fisher-Yates on a copy
export function shuffle<T>(items: readonly T[], random: RandomSource = Math.random): T[] {
  const result = [...items]
  for (let i = result.length - 1; i > 0; i--) {
    const j = randomIndex(i + 1, random)
    ;[result[i], result[j]] = [result[j], result[i]]
  }
  return result
}

// Draws `count` items without replacement
export function sample<T>(items: readonly T[], count: number, random: RandomSource = Math.random): T[] {
  return shuffle(items, random).slice(0, Math.max(0, count))
}

export function unique<T>(items: readonly T[]): T[] {
  return [...new Set(items)]
}
