/**
 * Enumerated Domain Kinds
 *
 * Closed string-literal unions for the kinds of values the domain knows
 * about. Each union that can receive unrecognized text from a data file has
 * an explicit fallback member; mapping text onto these unions happens in the
 * storage layer, never here.
 *
 * This module contains only types and constant lookup tables.
 */

/**
 * Academic degree the program leads to.
 */
export type DegreeType = 'bachelor' | 'master';

/**
 * Time model the program is studied in.
 *
 * - 'full-time': nominal duration
 * - 'part-time-I' / 'part-time-II': stretched durations
 */
export type StudyModel = 'full-time' | 'part-time-I' | 'part-time-II';

/**
 * Assessment format of an exam attempt.
 * 'other' is the fallback for anything the domain does not recognize.
 */
export type ExamType =
  | 'written-exam'
  | 'term-paper'
  | 'project'
  | 'oral-exam'
  | 'advanced-workbook'
  | 'portfolio'
  | 'project-report'
  | 'seminar-paper'
  | 'case-study'
  | 'thesis'
  | 'colloquium'
  | 'project-presentation'
  | 'other';

/**
 * Derived status of a single exam attempt.
 *
 * - 'planned': no grade and no date yet
 * - 'registered': no grade, dated today or later
 * - 'overdue': no grade, dated before the reference date
 * - 'passed': graded better than 4.0
 * - 'failed': graded 4.0 or worse
 */
export type ExamStatus = 'planned' | 'registered' | 'passed' | 'failed' | 'overdue';

/**
 * Derived status of a module.
 */
export type ModuleStatus = 'planned' | 'in-progress' | 'completed';

/** Every degree type, in display order. */
export const DEGREE_TYPES: readonly DegreeType[] = ['bachelor', 'master'];

/** Every study model, in display order. */
export const STUDY_MODELS: readonly StudyModel[] = ['full-time', 'part-time-I', 'part-time-II'];

/** Every exam type, fallback last. */
export const EXAM_TYPES: readonly ExamType[] = [
  'written-exam',
  'term-paper',
  'project',
  'oral-exam',
  'advanced-workbook',
  'portfolio',
  'project-report',
  'seminar-paper',
  'case-study',
  'thesis',
  'colloquium',
  'project-presentation',
  'other',
];

/** Human-readable labels for study models. */
export const STUDY_MODEL_LABELS: Record<StudyModel, string> = {
  'full-time': 'Full-time',
  'part-time-I': 'Part-time I',
  'part-time-II': 'Part-time II',
};

/** Grades below this value pass. */
export const PASSING_GRADE_LIMIT = 4.0;

/** Best possible grade. */
export const MIN_GRADE = 1.0;

/** Worst possible grade. */
export const MAX_GRADE = 5.0;

/** A module never has more attempts than this. */
export const MAX_ATTEMPTS = 3;
