/**
 * Program Domain Entity
 *
 * The degree program being tracked and the root of the object graph:
 * Program -> Semester -> StudyModule -> ExamAttempt, each level owned
 * exclusively by its parent.
 *
 * Besides holding the data, Program answers every program-wide KPI
 * question: credits earned, progress, target credits for a date, weighted
 * grade average and the modules that need attention. All queries are pure
 * functions of the current field values and the date passed in.
 */

import { isValidDate, toCalendarDate } from '../dates';
import { DomainValidationError } from './errors';
import type { Semester } from './semester';
import type { StudyModule } from './study-module';
import type { DegreeType, StudyModel } from './types';

/** Grade target used when none is given. */
export const DEFAULT_GRADE_TARGET = 2.5;

/** Days ahead an upcoming exam counts as critical. */
export const DEFAULT_CRITICAL_HORIZON_DAYS = 60;

/**
 * Constructor input for a Program.
 */
export interface ProgramInput {
  name: string;
  degree: DegreeType;
  studyModel: StudyModel;
  /** Credits required for the degree (> 0) */
  targetCredits: number;
  /** Nominal duration in months (> 0) */
  durationMonths: number;
  startDate: Date;
  /** At least one semester */
  semesters: Semester[];
}

export class Program {
  readonly name: string;
  readonly degree: DegreeType;
  readonly studyModel: StudyModel;
  readonly targetCredits: number;
  readonly durationMonths: number;
  readonly semesters: readonly Semester[];
  private readonly _startDate: Date;

  constructor(input: ProgramInput) {
    if (!Number.isFinite(input.targetCredits) || input.targetCredits <= 0) {
      throw new DomainValidationError(
        'targetCredits',
        input.targetCredits,
        `Program target credits must be > 0, got ${input.targetCredits}.`
      );
    }
    if (!Number.isFinite(input.durationMonths) || input.durationMonths <= 0) {
      throw new DomainValidationError(
        'durationMonths',
        input.durationMonths,
        `Program duration must be > 0 months, got ${input.durationMonths}.`
      );
    }
    if (!isValidDate(input.startDate)) {
      throw new DomainValidationError('startDate', input.startDate, 'Program start date must be a valid date.');
    }
    if (input.semesters.length === 0) {
      throw new DomainValidationError('semesters', 0, 'A program must contain at least one semester.');
    }

    this.name = input.name;
    this.degree = input.degree;
    this.studyModel = input.studyModel;
    this.targetCredits = input.targetCredits;
    this.durationMonths = input.durationMonths;
    this._startDate = toCalendarDate(input.startDate);
    this.semesters = [...input.semesters];
  }

  /** Enrolment date as a calendar date. Returns a copy. */
  get startDate(): Date {
    return new Date(this._startDate.getTime());
  }

  /**
   * All modules across all semesters, in program order.
   */
  modules(): StudyModule[] {
    return this.semesters.flatMap((s) => [...s.modules]);
  }

  /** Sum of credits over all passed modules. */
  earnedCredits(): number {
    return this.modules().reduce((sum, m) => (m.isPassed() ? sum + m.credits : sum), 0);
  }

  /**
   * Earned credits as a percentage of the target. May exceed 100.
   */
  progressPercent(): number {
    if (this.targetCredits === 0) {
      return 0;
    }
    return (this.earnedCredits() / this.targetCredits) * 100;
  }

  /**
   * Credit-weighted average over all graded modules, or null when no
   * module has passed yet.
   */
  weightedAverageGrade(): number | null {
    let weightedSum = 0;
    let creditSum = 0;
    for (const module of this.modules()) {
      const grade = module.grade();
      if (grade !== null) {
        weightedSum += module.credits * grade;
        creditSum += module.credits;
      }
    }
    return creditSum === 0 ? null : weightedSum / creditSum;
  }

  /**
   * Credits the plan expects to be earned by `date`, rounded to an integer.
   *
   * Semesters with both boundary dates contribute their interpolated share.
   * If that sum is exactly zero, the result is estimated from the nominal
   * duration instead: every full `durationMonths / semesterCount` months
   * since the program start counts one semester as done. The fallback also
   * fires when `date` precedes every dated semester.
   */
  targetCreditsAsOf(date: Date): number {
    let target = 0;
    for (const semester of this.semesters) {
      target += semester.targetCreditsAsOf(date) ?? 0;
    }

    if (target === 0) {
      const monthsPerSemester = this.durationMonths / this.semesters.length;
      const asOf = toCalendarDate(date);
      const monthsElapsed = Math.max(
        0,
        (asOf.getFullYear() - this._startDate.getFullYear()) * 12 +
          (asOf.getMonth() - this._startDate.getMonth())
      );
      const completed = Math.min(
        Math.floor(monthsElapsed / monthsPerSemester),
        this.semesters.length
      );
      for (const semester of this.semesters.slice(0, completed)) {
        target += semester.plannedCredits;
      }
    }

    return roundHalfToEven(target);
  }

  /**
   * Earned minus target credits as of `date`. Positive means ahead of plan.
   */
  deviationFromTarget(date: Date): number {
    return this.earnedCredits() - this.targetCreditsAsOf(date);
  }

  /**
   * Highest semester number in which credits have been earned; 1 before
   * anything has been passed.
   */
  currentSemesterNumber(): number {
    let current = 1;
    for (const semester of this.semesters) {
      if (semester.earnedCredits() > 0) {
        current = Math.max(current, semester.number);
      }
    }
    return current;
  }

  /**
   * Number of modules whose grade is worse (numerically greater) than
   * `targetGrade`.
   */
  countModulesAboveGradeTarget(targetGrade: number = DEFAULT_GRADE_TARGET): number {
    return this.modules().filter((m) => {
      const grade = m.grade();
      return grade !== null && grade > targetGrade;
    }).length;
  }

  /**
   * Modules that are not completed and whose next relevant exam is either
   * overdue or due within `horizonDays` days (inclusive). Program order.
   */
  criticalModules(asOf: Date, horizonDays: number = DEFAULT_CRITICAL_HORIZON_DAYS): StudyModule[] {
    return this.modules().filter((module) => {
      if (module.isPassed()) {
        return false;
      }
      const next = module.nextRelevantExam(asOf);
      const delta = next === null ? null : next.daysUntil(asOf);
      if (next === null || delta === null) {
        return false;
      }
      if (next.status(asOf) === 'overdue') {
        return true;
      }
      return delta >= 0 && delta <= horizonDays;
    });
  }
}

/**
 * Rounds to the nearest integer; exact halves go to the even neighbour.
 */
function roundHalfToEven(value: number): number {
  const floor = Math.floor(value);
  const diff = value - floor;
  if (diff > 0.5) {
    return floor + 1;
  }
  if (diff < 0.5) {
    return floor;
  }
  return floor % 2 === 0 ? floor : floor + 1;
}
