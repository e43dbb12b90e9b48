import type { EnumeratedDate, LayerDefinition, ResolvedShift, RotationSlot } from './schedule.types.js';

/**
 * Applies the rotation policy to a layer's enumerated dates.
 *
 * The entry at position `i` goes to `team[i % team.length]`. Every entry
 * consumes a position, including the ones suppressed by a dummy flag, so a
 * placeholder slot never shifts who covers the following dates.
 */
export function assignRotation(layer: LayerDefinition, layerIndex: number, entries: EnumeratedDate[]): RotationSlot[] {
  const team = layer.rotationTeam;
  if (team.length === 0) {
    return [];
  }

  return entries.map(({ date, weekday }, position): RotationSlot => {
    const person = team[position % team.length];
    const window = layer.timeWindows[weekday];

    if (layer.dummy) {
      return { status: 'suppressed', position, date, weekday, person, reason: 'layer_dummy' };
    }
    if (!window || window.dummy) {
      return { status: 'suppressed', position, date, weekday, person, reason: 'window_dummy' };
    }

    return {
      status: 'active',
      position,
      shift: {
        date,
        weekday,
        layerId: layer.id,
        layerName: layer.name,
        startTime: window.start,
        endTime: window.end,
        person,
        layerIndex,
      },
    };
  });
}

export function materializeShifts(slots: RotationSlot[]): ResolvedShift[] {
  const shifts: ResolvedShift[] = [];
  for (const slot of slots) {
    if (slot.status === 'active') {
      shifts.push(slot.shift);
    }
  }
  return shifts;
}
