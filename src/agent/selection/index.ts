/**
 * Tool Selection
 */

import type { RootcauseConfig } from '../../core/config.js';
import { DEFAULT_ROUTES, DirectedSelectionPolicy } from './directed.js';
import { DEFAULT_SCHEDULE, ScheduleSelectionPolicy } from './schedule.js';
import type { SelectionPolicy } from './types.js';

export * from './types.js';
export { DEFAULT_SCHEDULE, ScheduleSelectionPolicy, type SelectionSchedule } from './schedule.js';
export { DEFAULT_ROUTES, DirectedSelectionPolicy } from './directed.js';

export function createSelectionPolicy(config: RootcauseConfig['selection']): SelectionPolicy {
  const schedule = new ScheduleSelectionPolicy(config.schedule ?? DEFAULT_SCHEDULE);
  if (config.strategy === 'directed') {
    return new DirectedSelectionPolicy(config.routes ?? DEFAULT_ROUTES, schedule);
  }
  return schedule;
}
