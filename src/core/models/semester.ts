/**
 * Semester Domain Entity
 *
 * A time-boxed slice of the program with a planned credit target. The
 * optional start and end dates feed the target-credit interpolation in
 * {@link Program.targetCreditsAsOf}.
 */

import { daysBetween, isValidDate, toCalendarDate } from '../dates';
import { DomainValidationError } from './errors';
import type { StudyModule } from './study-module';

/**
 * Constructor input for a Semester.
 */
export interface SemesterInput {
  /** Sequence number, starting at 1 */
  number: number;
  /** Credits the study plan schedules for this semester (> 0) */
  plannedCredits: number;
  startDate?: Date | null;
  endDate?: Date | null;
  modules?: StudyModule[];
}

function optionalDate(field: string, date: Date | null | undefined): Date | null {
  if (date === null || date === undefined) {
    return null;
  }
  if (!isValidDate(date)) {
    throw new DomainValidationError(field, date, `Semester ${field} must be a valid calendar date.`);
  }
  return toCalendarDate(date);
}

function copyDate(date: Date | null): Date | null {
  return date === null ? null : new Date(date.getTime());
}

export class Semester {
  readonly number: number;
  readonly plannedCredits: number;
  readonly modules: readonly StudyModule[];
  private readonly _startDate: Date | null;
  private readonly _endDate: Date | null;

  constructor(input: SemesterInput) {
    if (!Number.isInteger(input.number) || input.number < 1) {
      throw new DomainValidationError(
        'number',
        input.number,
        `Semester number must be >= 1, got ${input.number}.`
      );
    }
    if (!Number.isFinite(input.plannedCredits) || input.plannedCredits <= 0) {
      throw new DomainValidationError(
        'plannedCredits',
        input.plannedCredits,
        `Semester ${input.number}: planned credits must be > 0, got ${input.plannedCredits}.`
      );
    }

    const startDate = optionalDate('startDate', input.startDate);
    const endDate = optionalDate('endDate', input.endDate);
    if (startDate && endDate && daysBetween(startDate, endDate) < 0) {
      throw new DomainValidationError(
        'endDate',
        endDate,
        `Semester ${input.number}: end date must not be before start date.`
      );
    }

    this.number = input.number;
    this.plannedCredits = input.plannedCredits;
    this._startDate = startDate;
    this._endDate = endDate;
    this.modules = [...(input.modules ?? [])];
  }

  /** First calendar day, or null. Returns a copy. */
  get startDate(): Date | null {
    return copyDate(this._startDate);
  }

  /** Last calendar day, or null. Returns a copy. */
  get endDate(): Date | null {
    return copyDate(this._endDate);
  }

  /** Sum of credits of the passed modules in this semester. */
  earnedCredits(): number {
    return this.modules.reduce((sum, m) => (m.isPassed() ? sum + m.credits : sum), 0);
  }

  /**
   * Earned credits as a percentage of the plan. May exceed 100.
   */
  progressPercent(): number {
    if (this.plannedCredits === 0) {
      return 0;
    }
    return (this.earnedCredits() / this.plannedCredits) * 100;
  }

  /**
   * Share of `plannedCredits` due by `date`, interpolated linearly over the
   * semester's span. Returns null when either boundary date is missing.
   */
  targetCreditsAsOf(date: Date): number | null {
    const start = this._startDate;
    const end = this._endDate;
    if (start === null || end === null) {
      return null;
    }
    if (daysBetween(end, date) >= 0) {
      return this.plannedCredits;
    }
    if (daysBetween(start, date) <= 0) {
      return 0;
    }
    // A single-day semester would otherwise divide by zero.
    const totalDays = Math.max(1, daysBetween(start, end));
    const elapsed = daysBetween(start, date);
    const fraction = Math.max(0, Math.min(1, elapsed / totalDays));
    return this.plannedCredits * fraction;
  }
}
