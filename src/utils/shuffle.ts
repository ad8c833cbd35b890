/**
 * Return a shuffled copy of `items` (Fisher-Yates)
 *
 * @param random - Source of numbers in [0, 1), injectable for tests
 */
export function shuffle<T>(items: readonly T[], random: () => number = Math.random): T[] {
  const result = [...items];
  for (let i = result.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [result[i], result[j]] = [result[j], result[i]];
  }
  return result;
}
