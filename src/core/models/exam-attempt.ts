/**
 * ExamAttempt Domain Entity
 *
 * One attempt (of up to three) at passing a module's assessment. An attempt
 * stores only what the user records: the scheduled date and the grade. Its
 * status is always derived from those two values and a reference date, so
 * there is no status field to keep in sync after an edit.
 *
 * Grades follow the German scale: 1.0 is best, 5.0 is worst, and anything
 * below 4.0 passes.
 */

import { daysBetween, isValidDate, toCalendarDate } from '../dates';
import { DomainValidationError } from './errors';
import {
  MAX_ATTEMPTS,
  MAX_GRADE,
  MIN_GRADE,
  PASSING_GRADE_LIMIT,
  type ExamStatus,
  type ExamType,
} from './types';

/**
 * Constructor input for an ExamAttempt.
 */
export interface ExamAttemptInput {
  /** Identifier, e.g. 'CS101-A1' */
  id: string;
  /** Assessment format */
  examType: ExamType;
  /** Scheduled date, or null while unscheduled */
  date?: Date | null;
  /** 1, 2 or 3 */
  attemptNumber: number;
  /** Grade in [1.0, 5.0], or null while ungraded */
  grade?: number | null;
}

/**
 * Throws unless `grade` is null or a finite number in [1.0, 5.0].
 */
export function assertValidGrade(grade: number | null): void {
  if (grade === null) {
    return;
  }
  if (!Number.isFinite(grade) || grade < MIN_GRADE || grade > MAX_GRADE) {
    throw new DomainValidationError(
      'grade',
      grade,
      `Grade must be between ${MIN_GRADE.toFixed(1)} and ${MAX_GRADE.toFixed(1)}, got ${grade}.`
    );
  }
}

/**
 * Throws unless `attemptNumber` is 1, 2 or 3.
 */
export function assertValidAttemptNumber(attemptNumber: number): void {
  if (!Number.isInteger(attemptNumber) || attemptNumber < 1 || attemptNumber > MAX_ATTEMPTS) {
    throw new DomainValidationError(
      'attemptNumber',
      attemptNumber,
      `Attempt number must be between 1 and ${MAX_ATTEMPTS}, got ${attemptNumber}.`
    );
  }
}

function normalizeDate(date: Date | null): Date | null {
  if (date === null) {
    return null;
  }
  if (!isValidDate(date)) {
    throw new DomainValidationError('date', date, 'Exam date must be a valid calendar date.');
  }
  return toCalendarDate(date);
}

export class ExamAttempt {
  readonly id: string;
  readonly examType: ExamType;
  readonly attemptNumber: number;
  private _date: Date | null;
  private _grade: number | null;

  constructor(input: ExamAttemptInput) {
    assertValidAttemptNumber(input.attemptNumber);
    const grade = input.grade ?? null;
    assertValidGrade(grade);

    this.id = input.id;
    this.examType = input.examType;
    this.attemptNumber = input.attemptNumber;
    this._date = normalizeDate(input.date ?? null);
    this._grade = grade;
  }

  /** Scheduled calendar date, or null. Returns a copy. */
  get date(): Date | null {
    return this._date === null ? null : new Date(this._date.getTime());
  }

  /**
   * Sets or clears the scheduled date. The value is stored as a calendar
   * date; an invalid Date is rejected.
   */
  set date(value: Date | null) {
    this._date = normalizeDate(value);
  }

  /** Recorded grade, or null while ungraded. */
  get grade(): number | null {
    return this._grade;
  }

  /**
   * Sets or clears the grade. Out-of-range values throw and leave the
   * previous grade in place.
   */
  set grade(value: number | null) {
    assertValidGrade(value);
    this._grade = value;
  }

  /** Whether a grade has been recorded. */
  isGraded(): boolean {
    return this._grade !== null;
  }

  /** Whether the attempt is graded with a passing grade. */
  isPassed(): boolean {
    return this._grade !== null && this._grade < PASSING_GRADE_LIMIT;
  }

  /**
   * Derives the status of this attempt as of `asOf`.
   *
   * - grade < 4.0 -> 'passed'
   * - grade >= 4.0 -> 'failed'
   * - no grade, no date -> 'planned'
   * - no grade, date before asOf -> 'overdue'
   * - no grade, date on or after asOf -> 'registered'
   */
  status(asOf: Date): ExamStatus {
    if (this._grade !== null) {
      return this._grade < PASSING_GRADE_LIMIT ? 'passed' : 'failed';
    }
    if (this._date === null) {
      return 'planned';
    }
    if (daysBetween(asOf, this._date) < 0) {
      return 'overdue';
    }
    return 'registered';
  }

  /**
   * Days from `asOf` until the scheduled date, or null when unscheduled.
   */
  daysUntil(asOf: Date): number | null {
    return this._date === null ? null : daysBetween(asOf, this._date);
  }
}

/**
 * Functional form of {@link ExamAttempt.status}.
 */
export function examStatus(attempt: ExamAttempt, asOf: Date): ExamStatus {
  return attempt.status(asOf);
}
