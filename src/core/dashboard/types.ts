/**
 * Dashboard Types
 *
 * Shapes of the read-only snapshot the dashboard service hands to the
 * presentation layer. Everything in here is derived; nothing points back
 * into the mutable program graph.
 */

/**
 * A module that needs attention, with the exam that makes it urgent.
 *
 * @example
 * ```typescript
 * const entry: CriticalEntry = {
 *   moduleCode: 'CS101',
 *   title: 'Mathematics: Analysis',
 *   statusText: 'Exam in 12 days: 15.03.2024',
 *   examDate: new Date(2024, 2, 15),
 *   isOverdue: false,
 * };
 * ```
 */
export interface CriticalEntry {
  moduleCode: string;
  title: string;
  /** Human-readable urgency phrase, e.g. 'Exam TOMORROW: 02.03.2024' */
  statusText: string;
  /** Scheduled date of the relevant exam, or null if unscheduled */
  examDate: Date | null;
  /** Whether the exam date has passed without a grade */
  isOverdue: boolean;
}

/**
 * Plan-versus-actual status of one semester.
 */
export type SemesterPlanStatus = 'over-plan' | 'on-plan' | 'under-plan';

/**
 * One row of the semester overview table.
 */
export interface SemesterRow {
  number: number;
  plannedCredits: number;
  earnedCredits: number;
  status: SemesterPlanStatus;
  /** 'over plan', 'on plan' or 'under plan (-N credits)' */
  statusText: string;
}

/**
 * Counts of ungraded exam attempts.
 * `overdue` is a subset of `open`.
 */
export interface ExamCounts {
  open: number;
  overdue: number;
}

/**
 * Complete snapshot for one program as of one reference date.
 */
export interface DashboardState {
  // General information
  programName: string;
  /** e.g. 'Part-time I, 48 months' */
  studyModelText: string;
  durationMonths: number;
  startDate: Date;
  currentSemester: number;
  totalSemesters: number;
  targetCredits: number;
  gradeTarget: number;

  // Progress
  earnedCredits: number;
  progressPercent: number;
  targetCreditsToDate: number;
  /** earned - target to date; positive means ahead of plan */
  deviation: number;

  // Grades
  averageGrade: number | null;
  modulesAboveGradeTarget: number;

  // Exams
  examCounts: ExamCounts;
  /** Horizon used for {@link criticalModuleCount} */
  criticalHorizonDays: number;
  /** Modules whose next exam is overdue or due within the horizon */
  criticalModuleCount: number;
  /** Sorted by urgency, at most {@link CRITICAL_ENTRIES_LIMIT} entries */
  criticalEntries: readonly CriticalEntry[];

  // Semester table
  semesterRows: readonly SemesterRow[];
}
