/**
 * Core Dashboard Module - Barrel Export
 *
 * @example
 * ```typescript
 * import { DashboardService, type DashboardState } from '../core/dashboard';
 *
 * const state = new DashboardService().buildState(program, today());
 * ```
 */

export { DashboardService, CRITICAL_ENTRIES_LIMIT, compareCriticalEntries } from './dashboard-service';
export type { DashboardServiceOptions } from './dashboard-service';

export type {
  CriticalEntry,
  DashboardState,
  ExamCounts,
  SemesterPlanStatus,
  SemesterRow,
} from './types';
