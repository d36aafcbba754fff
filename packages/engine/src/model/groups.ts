/**
 * Instrument groups and the fixed dimensions of the pad grid.
 */

export const GROUPS = ['DRUMS', 'BASS', 'LEAD', 'VOCAL'] as const;

export type Group = typeof GROUPS[number];

export const GROUP_COUNT = GROUPS.length;
export const PADS_PER_GROUP = 16;
export const MAX_PATTERNS = 99;
export const DEFAULT_STEPS_PER_PATTERN = 16;
export const MAX_STEPS_PER_PATTERN = 64;

export function isGroup(value: unknown): value is Group {
  return typeof value === 'string' && GROUPS.some(g => g === value);
}

export function groupIndex(group: Group): number {
  return GROUPS.indexOf(group);
}

export function groupAt(index: number): Group | undefined {
  return Number.isInteger(index) && index >= 0 && index < GROUP_COUNT ? GROUPS[index] : undefined;
}

export function isPadIndex(pad: unknown): pad is number {
  return typeof pad === 'number' && Number.isInteger(pad) && pad >= 0 && pad < PADS_PER_GROUP;
}

export function isPatternIndex(index: unknown): index is number {
  return typeof index === 'number' && Number.isInteger(index) && index >= 0 && index < MAX_PATTERNS;
}

export function isStepsPerPattern(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 1 && value <= MAX_STEPS_PER_PATTERN;
}

/** Next group in display order, wrapping DRUMS <- VOCAL. */
export function cycleGroup(group: Group, direction: 1 | -1): Group {
  const next = (groupIndex(group) + direction + GROUP_COUNT) % GROUP_COUNT;
  return GROUPS[next];
}

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}
