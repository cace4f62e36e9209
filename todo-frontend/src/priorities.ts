import { colors } from './colors';
import { type Priority, PriorityLevel } from './types';

const definePriority = (priority: Priority): Priority => Object.freeze(priority);

export const URGENT = definePriority({
  level: PriorityLevel.URGENT,
  rank: 0,
  title: 'Urgent',
  color: colors.priority.urgent,
  icon: 'priority-high'
});

export const HIGH = definePriority({
  level: PriorityLevel.HIGH,
  rank: 1,
  title: 'High',
  color: colors.priority.high,
  icon: 'star'
});

export const MEDIUM = definePriority({
  level: PriorityLevel.MEDIUM,
  rank: 2,
  title: 'Medium',
  color: colors.priority.medium,
  icon: 'star-half'
});

export const LOW = definePriority({
  level: PriorityLevel.LOW,
  rank: 3,
  title: 'Low',
  color: colors.priority.low,
  icon: 'low-priority'
});

// Most severe first
export const PRIORITIES: readonly Priority[] = Object.freeze([URGENT, HIGH, MEDIUM, LOW]);

// Initial selection of the creation form
export const DEFAULT_PRIORITY = LOW;

/**
 * Display labels in severity order, for populating a selection control.
 */
export const priorityLabels = (): string[] => PRIORITIES.map((priority) => priority.title);

/**
 * Resolves a display label back to its priority. Matching is exact;
 * an unknown label yields `undefined` and the caller decides what to do.
 */
export const priorityByLabel = (label: string): Priority | undefined =>
  PRIORITIES.find((priority) => priority.title === label);

export const comparePriority = (a: Priority, b: Priority): number => a.rank - b.rank;
