/**
 * @market-hours/calendar-refresh
 *
 * Refresh orchestrator, schedule validation and the daily scheduler
 */

export { validateSchedule } from './validate.js';
export type { ValidatedSchedule } from './validate.js';

export { RefreshOrchestrator, refreshErrorKind } from './orchestrator.js';
export type { RefreshOrchestratorOptions, RefreshStore } from './orchestrator.js';

export { RefreshScheduler, nextTriggerTime, dailyCronPattern } from './scheduler.js';
export type {
  RefreshSchedulerOptions,
  RefreshCycleRunner,
  SchedulerState,
  SchedulerLifecycle,
  RefreshTrigger,
} from './scheduler.js';
