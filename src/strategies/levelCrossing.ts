/**
 * Grid boundaries crossed between two trading days.
 *
 * Moving from level index `a` to `b` crosses the boundaries
 * `levels[min(a, b)] .. levels[max(a, b) - 1]`. Upward crossings list them
 * ascending (sell order), downward crossings descending (buy order), so a
 * sell on the way up settles against the buy made at the same boundary on
 * the way down.
 */
export type LevelCrossing =
  | { kind: 'none' }
  | { kind: 'up'; levels: number[] }
  | { kind: 'down'; levels: number[] };

export function detectCrossing(previousLevel: number, currentLevel: number): LevelCrossing {
  if (currentLevel > previousLevel) {
    const levels: number[] = [];
    for (let level = previousLevel; level < currentLevel; level++) {
      levels.push(level);
    }
    return { kind: 'up', levels };
  }

  if (currentLevel < previousLevel) {
    const levels: number[] = [];
    for (let level = previousLevel - 1; level >= currentLevel; level--) {
      levels.push(level);
    }
    return { kind: 'down', levels };
  }

  return { kind: 'none' };
}
