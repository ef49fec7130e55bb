/**
 * StudyModule Domain Entity
 *
 * A course unit worth a fixed number of credits, assessed through one to
 * three exam attempts. The module is completed as soon as any attempt
 * passes, and its grade is the grade of the first passing attempt; later
 * attempts never improve or average into it.
 *
 * Module codes are not unique across a program. Data files sometimes carry
 * the same code twice (e.g. an elective slot reused in two semesters), so
 * nothing here assumes uniqueness.
 */

import { DomainValidationError } from './errors';
import { ExamAttempt } from './exam-attempt';
import { MAX_ATTEMPTS, type ModuleStatus } from './types';

/**
 * Constructor input for a StudyModule.
 */
export interface StudyModuleInput {
  code: string;
  title: string;
  /** Credits awarded on passing; a positive integer */
  credits: number;
  /** Semester the curriculum recommends taking the module in (>= 1) */
  recommendedSemester: number;
  /** One to three attempts */
  attempts: ExamAttempt[];
}

function byAttemptNumber(a: ExamAttempt, b: ExamAttempt): number {
  return a.attemptNumber - b.attemptNumber;
}

function byDate(a: ExamAttempt, b: ExamAttempt): number {
  return (a.date?.getTime() ?? 0) - (b.date?.getTime() ?? 0);
}

export class StudyModule {
  readonly code: string;
  readonly title: string;
  readonly credits: number;
  readonly recommendedSemester: number;
  private readonly _attempts: ExamAttempt[];

  constructor(input: StudyModuleInput) {
    if (!Number.isInteger(input.credits) || input.credits <= 0) {
      throw new DomainValidationError(
        'credits',
        input.credits,
        `Module ${input.code}: credits must be a positive integer, got ${input.credits}.`
      );
    }
    if (!Number.isInteger(input.recommendedSemester) || input.recommendedSemester < 1) {
      throw new DomainValidationError(
        'recommendedSemester',
        input.recommendedSemester,
        `Module ${input.code}: recommended semester must be >= 1, got ${input.recommendedSemester}.`
      );
    }
    if (input.attempts.length < 1 || input.attempts.length > MAX_ATTEMPTS) {
      throw new DomainValidationError(
        'attempts',
        input.attempts.length,
        `Module ${input.code}: must have 1 to ${MAX_ATTEMPTS} exam attempts, has ${input.attempts.length}.`
      );
    }

    this.code = input.code;
    this.title = input.title;
    this.credits = input.credits;
    this.recommendedSemester = input.recommendedSemester;
    this._attempts = [...input.attempts];
  }

  /** Attempts in their current order. */
  get attempts(): readonly ExamAttempt[] {
    return this._attempts;
  }

  /**
   * Appends an attempt and re-sorts the list by attempt number.
   *
   * @throws DomainValidationError if the module already has three attempts
   */
  addAttempt(attempt: ExamAttempt): void {
    if (this._attempts.length >= MAX_ATTEMPTS) {
      throw new DomainValidationError(
        'attempts',
        this._attempts.length + 1,
        `Module ${this.code}: at most ${MAX_ATTEMPTS} exam attempts are allowed.`
      );
    }
    this._attempts.push(attempt);
    this._attempts.sort(byAttemptNumber);
  }

  /** The attempt with the given number, if any. */
  findAttempt(attemptNumber: number): ExamAttempt | undefined {
    return this._attempts.find((a) => a.attemptNumber === attemptNumber);
  }

  /**
   * Attempt numbers that occur more than once. Tolerated, but worth
   * reporting when a data file is loaded.
   */
  duplicateAttemptNumbers(): number[] {
    const seen = new Set<number>();
    const duplicates = new Set<number>();
    for (const attempt of this._attempts) {
      if (seen.has(attempt.attemptNumber)) {
        duplicates.add(attempt.attemptNumber);
      }
      seen.add(attempt.attemptNumber);
    }
    return [...duplicates].sort((a, b) => a - b);
  }

  /** Whether any attempt passed. */
  isPassed(): boolean {
    return this._attempts.some((a) => a.isPassed());
  }

  /**
   * The module grade: the grade of the lowest-numbered passing attempt,
   * or null if no attempt passed.
   */
  grade(): number | null {
    const passed = this._attempts.filter((a) => a.isPassed()).sort(byAttemptNumber);
    return passed.length > 0 ? passed[0].grade : null;
  }

  /**
   * Derives the module status as of `asOf`.
   *
   * - any attempt passed -> 'completed'
   * - any attempt planned, registered, overdue or failed -> 'in-progress'
   * - otherwise -> 'planned'
   */
  status(asOf: Date): ModuleStatus {
    if (this.isPassed()) {
      return 'completed';
    }
    const active = this._attempts.some((a) => {
      const s = a.status(asOf);
      return s === 'planned' || s === 'registered' || s === 'overdue' || s === 'failed';
    });
    return active ? 'in-progress' : 'planned';
  }

  /**
   * The exam that needs attention next, considering ungraded attempts only:
   * 1) the earliest overdue attempt,
   * 2) else the earliest attempt dated on or after `asOf`,
   * 3) else null.
   * Ungraded attempts without a date are never returned.
   */
  nextRelevantExam(asOf: Date): ExamAttempt | null {
    const open = this._attempts.filter((a) => !a.isGraded() && a.date !== null);

    const overdue = open.filter((a) => a.status(asOf) === 'overdue').sort(byDate);
    if (overdue.length > 0) {
      return overdue[0];
    }

    const upcoming = open.filter((a) => a.status(asOf) === 'registered').sort(byDate);
    return upcoming.length > 0 ? upcoming[0] : null;
  }
}

/** Functional form of {@link StudyModule.status}. */
export function moduleStatus(module: StudyModule, asOf: Date): ModuleStatus {
  return module.status(asOf);
}

/** Functional form of {@link StudyModule.grade}. */
export function moduleGrade(module: StudyModule): number | null {
  return module.grade();
}

/** Functional form of {@link StudyModule.nextRelevantExam}. */
export function nextRelevantExam(module: StudyModule, asOf: Date): ExamAttempt | null {
  return module.nextRelevantExam(asOf);
}
