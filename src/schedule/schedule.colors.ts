import { PERSON_COLOR_PALETTE } from '../constants.js';
import type { PersonColorMap, ResolvedShift } from './schedule.types.js';

/**
 * Gives each person the next palette color the first time they appear in
 * the canonical schedule. Past the palette size, colors repeat.
 */
export function assignPersonColors(
  schedule: readonly ResolvedShift[],
  palette: readonly string[] = PERSON_COLOR_PALETTE,
): PersonColorMap {
  const colors: PersonColorMap = new Map();
  if (palette.length === 0) {
    return colors;
  }

  for (const { person } of schedule) {
    if (!colors.has(person)) {
      colors.set(person, palette[colors.size % palette.length]);
    }
  }

  return colors;
}
