/**
 * Dashboard Service
 *
 * Reads a program graph as of a reference date and assembles the
 * {@link DashboardState} the console view renders: identifying data,
 * progress and grade KPIs, exam counts, the ranked list of critical
 * modules and the per-semester plan table.
 *
 * The service never mutates the program. Every call recomputes from the
 * current field values, so the result depends only on (program, asOf).
 *
 * @example
 * ```typescript
 * const service = new DashboardService();
 * const state = service.buildState(program, new Date(2024, 3, 1));
 * console.log(`${state.earnedCredits}/${state.targetCredits} credits`);
 * ```
 */

import { formatDisplayDate } from '../dates';
import {
  DEFAULT_CRITICAL_HORIZON_DAYS,
  DEFAULT_GRADE_TARGET,
  STUDY_MODEL_LABELS,
  type Program,
} from '../models';
import type {
  CriticalEntry,
  DashboardState,
  ExamCounts,
  SemesterPlanStatus,
  SemesterRow,
} from './types';

/** Maximum number of critical entries carried in a snapshot. */
export const CRITICAL_ENTRIES_LIMIT = 10;

/**
 * Options for the dashboard service.
 */
export interface DashboardServiceOptions {
  /** Grade the student aims for; modules graded worse are counted */
  gradeTarget?: number;
  /** Days ahead an upcoming exam makes its module critical */
  criticalHorizonDays?: number;
}

export class DashboardService {
  private readonly gradeTarget: number;
  private readonly criticalHorizonDays: number;

  constructor(options: DashboardServiceOptions = {}) {
    this.gradeTarget = options.gradeTarget ?? DEFAULT_GRADE_TARGET;
    this.criticalHorizonDays = options.criticalHorizonDays ?? DEFAULT_CRITICAL_HORIZON_DAYS;
  }

  /**
   * Builds the complete, frozen dashboard snapshot.
   */
  buildState(program: Program, asOf: Date): DashboardState {
    const state: DashboardState = {
      programName: program.name,
      studyModelText: `${STUDY_MODEL_LABELS[program.studyModel]}, ${program.durationMonths} months`,
      durationMonths: program.durationMonths,
      startDate: new Date(program.startDate.getTime()),
      currentSemester: program.currentSemesterNumber(),
      totalSemesters: program.semesters.length,
      targetCredits: program.targetCredits,
      gradeTarget: this.gradeTarget,

      earnedCredits: program.earnedCredits(),
      progressPercent: program.progressPercent(),
      targetCreditsToDate: program.targetCreditsAsOf(asOf),
      deviation: program.deviationFromTarget(asOf),

      averageGrade: program.weightedAverageGrade(),
      modulesAboveGradeTarget: program.countModulesAboveGradeTarget(this.gradeTarget),

      examCounts: Object.freeze(this.countExams(program, asOf)),
      criticalHorizonDays: this.criticalHorizonDays,
      criticalModuleCount: program.criticalModules(asOf, this.criticalHorizonDays).length,
      criticalEntries: Object.freeze(
        this.criticalEntries(program, asOf)
          .slice(0, CRITICAL_ENTRIES_LIMIT)
          .map((e) => Object.freeze(e))
      ),
      semesterRows: Object.freeze(this.buildSemesterRows(program).map((r) => Object.freeze(r))),
    };

    return Object.freeze(state);
  }

  /**
   * Every non-completed module that has a next relevant exam, ranked:
   * 1) overdue, earliest date first
   * 2) upcoming with a date, earliest first
   * 3) without a date
   * Ties keep program order. The list is not capped.
   */
  criticalEntries(program: Program, asOf: Date): CriticalEntry[] {
    const entries: CriticalEntry[] = [];

    for (const module of program.modules()) {
      if (module.isPassed()) {
        continue;
      }

      const exam = module.nextRelevantExam(asOf);
      if (exam === null) {
        continue;
      }

      const status = exam.status(asOf);
      const isOverdue = status === 'overdue';
      const examDate = exam.date;
      const dateText = examDate ? formatDisplayDate(examDate) : '-';
      const days = exam.daysUntil(asOf);

      let statusText: string;
      if (isOverdue) {
        statusText = `Exam overdue (scheduled: ${dateText})`;
      } else if (status === 'registered' && days !== null) {
        if (days === 0) {
          statusText = `Exam TODAY: ${dateText}`;
        } else if (days === 1) {
          statusText = `Exam TOMORROW: ${dateText}`;
        } else {
          statusText = `Exam in ${days} days: ${dateText}`;
        }
      } else {
        statusText = `Exam scheduled: ${dateText}`;
      }

      entries.push({
        moduleCode: module.code,
        title: module.title,
        statusText,
        examDate,
        isOverdue,
      });
    }

    return entries.sort(compareCriticalEntries);
  }

  /**
   * Counts ungraded attempts: overdue ones are both open and overdue,
   * planned and registered ones are open only.
   */
  private countExams(program: Program, asOf: Date): ExamCounts {
    let open = 0;
    let overdue = 0;

    for (const module of program.modules()) {
      for (const attempt of module.attempts) {
        if (attempt.isGraded()) {
          continue;
        }
        const status = attempt.status(asOf);
        if (status === 'overdue') {
          overdue++;
          open++;
        } else if (status === 'planned' || status === 'registered') {
          open++;
        }
      }
    }

    return { open, overdue };
  }

  private buildSemesterRows(program: Program): SemesterRow[] {
    return program.semesters.map((semester) => {
      const earned = semester.earnedCredits();
      const planned = semester.plannedCredits;

      let status: SemesterPlanStatus;
      let statusText: string;
      if (earned > planned) {
        status = 'over-plan';
        statusText = 'over plan';
      } else if (earned === planned) {
        status = 'on-plan';
        statusText = 'on plan';
      } else {
        status = 'under-plan';
        statusText = `under plan (-${formatCredits(planned - earned)} credits)`;
      }

      return {
        number: semester.number,
        plannedCredits: planned,
        earnedCredits: earned,
        status,
        statusText,
      };
    });
  }
}

/**
 * Sort rank of a critical entry: 0 overdue, 1 dated, 2 undated.
 */
function rankOf(entry: CriticalEntry): number {
  if (entry.examDate === null) {
    return 2;
  }
  return entry.isOverdue ? 0 : 1;
}

/**
 * Orders critical entries: overdue first, then upcoming, then undated.
 * Within the first two groups the earlier exam date comes first; equal
 * entries compare as 0 so a stable sort keeps their order.
 */
export function compareCriticalEntries(a: CriticalEntry, b: CriticalEntry): number {
  const rankDiff = rankOf(a) - rankOf(b);
  if (rankDiff !== 0) {
    return rankDiff;
  }
  if (a.examDate === null || b.examDate === null) {
    return 0;
  }
  return a.examDate.getTime() - b.examDate.getTime();
}

/**
 * Credits may be fractional in a semester plan; whole numbers print
 * without decimals.
 */
function formatCredits(value: number): string {
  return Number.isInteger(value) ? value.toString() : value.toFixed(1);
}
