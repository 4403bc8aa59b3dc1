import type { ChangeSide, LineChange } from './comparator.types';
import { getEffectiveLineRange, isVacuousLineChange } from './lineChanges';

/**
 * First change whose range on `side` covers `lineNumber`. Relies on the diff
 * engine reporting hunks in line order.
 */
export function locateLineChange(
  changes: readonly LineChange[] | null | undefined,
  lineNumber: number | null | undefined,
  side: ChangeSide
): LineChange | null {
  if (!lineNumber || lineNumber < 1 || !changes || changes.length === 0) {
    return null;
  }

  const match = changes.find((change) => {
    if (isVacuousLineChange(change)) {
      return false;
    }

    const { startLine, endLine } = getEffectiveLineRange(change, side);
    return lineNumber >= startLine && lineNumber <= endLine;
  });

  return match ?? null;
}
