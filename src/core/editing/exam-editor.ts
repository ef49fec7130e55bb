/**
 * Exam Editing Operations
 *
 * The only mutations the application performs on a loaded program: setting
 * or clearing a grade, setting or clearing an exam date, and adding a retake
 * attempt. Status is derived, so none of these has anything else to update.
 *
 * Text parsing for interactive input lives here as well so that the console
 * layer only decides what to print.
 *
 * @example
 * ```typescript
 * const result = findOrCreateAttempt(module, 2);
 * if (result.outcome === 'limit-reached') {
 *   console.log('No more attempts allowed.');
 * } else {
 *   setGrade(result.attempt, parseGradeInput('2,3'));
 * }
 * ```
 */

import { isValidDate, parseDisplayDate, parseIsoDate } from '../dates';
import {
  DomainValidationError,
  ExamAttempt,
  MAX_ATTEMPTS,
  assertValidAttemptNumber,
  assertValidGrade,
  type Program,
  type StudyModule,
} from '../models';

/**
 * Outcome of {@link findOrCreateAttempt}.
 *
 * - 'existing': an attempt with the requested number was already there
 * - 'created': a new, ungraded and unscheduled attempt was appended
 * - 'limit-reached': the module already has three attempts and none matches
 */
export type FindOrCreateAttemptResult =
  | { outcome: 'existing'; attempt: ExamAttempt }
  | { outcome: 'created'; attempt: ExamAttempt }
  | { outcome: 'limit-reached'; maxAttempts: number };

/**
 * Sets or clears the grade of an attempt.
 *
 * @throws DomainValidationError when the grade lies outside [1.0, 5.0];
 *   the attempt keeps its previous grade
 */
export function setGrade(attempt: ExamAttempt, grade: number | null): void {
  assertValidGrade(grade);
  attempt.grade = grade;
}

/**
 * Sets or clears the scheduled date of an attempt.
 *
 * @throws DomainValidationError when the date is invalid
 */
export function setExamDate(attempt: ExamAttempt, date: Date | null): void {
  if (date !== null && !isValidDate(date)) {
    throw new DomainValidationError('date', date, 'Exam date must be a valid calendar date.');
  }
  attempt.date = date;
}

/**
 * Returns the attempt with `attemptNumber`, creating it when the module has
 * room for another attempt. A created attempt copies the exam type of the
 * lowest-numbered existing attempt, has no date and no grade, and the
 * module's attempts are re-sorted by number afterwards.
 *
 * @throws DomainValidationError when `attemptNumber` is not 1, 2 or 3
 */
export function findOrCreateAttempt(
  module: StudyModule,
  attemptNumber: number
): FindOrCreateAttemptResult {
  assertValidAttemptNumber(attemptNumber);

  const existing = module.findAttempt(attemptNumber);
  if (existing) {
    return { outcome: 'existing', attempt: existing };
  }

  if (module.attempts.length >= MAX_ATTEMPTS) {
    return { outcome: 'limit-reached', maxAttempts: MAX_ATTEMPTS };
  }

  const base = [...module.attempts].sort((a, b) => a.attemptNumber - b.attemptNumber)[0];
  const attempt = new ExamAttempt({
    id: `${module.code}-A${attemptNumber}`,
    examType: base.examType,
    date: null,
    attemptNumber,
    grade: null,
  });
  module.addAttempt(attempt);

  return { outcome: 'created', attempt };
}

/**
 * All modules whose code matches `code` after trimming, in program order.
 * Duplicate codes are returned together; choosing between them is up to
 * the caller.
 */
export function findModulesByCode(program: Program, code: string): StudyModule[] {
  const needle = code.trim();
  if (!needle) {
    return [];
  }
  return program.modules().filter((m) => m.code.trim() === needle);
}

/**
 * Parses a grade typed by the user. Accepts '.' or ',' as decimal
 * separator. Blank input means "clear the grade" and yields null.
 *
 * @throws DomainValidationError for non-numeric or out-of-range input
 */
export function parseGradeInput(raw: string): number | null {
  const text = raw.trim();
  if (text === '') {
    return null;
  }
  const normalized = text.replace(',', '.');
  if (!/^\d+(\.\d+)?$/.test(normalized)) {
    throw new DomainValidationError('grade', raw, `"${raw}" is not a number.`);
  }
  const grade = Number(normalized);
  assertValidGrade(grade);
  return grade;
}

/**
 * Parses a date typed by the user, as `DD.MM.YYYY` or `YYYY-MM-DD`.
 * Blank input means "clear the date" and yields null.
 *
 * @throws DomainValidationError when neither format matches
 */
export function parseDateInput(raw: string): Date | null {
  const text = raw.trim();
  if (text === '') {
    return null;
  }
  const parsed = parseDisplayDate(text) ?? parseIsoDate(text);
  if (parsed === null) {
    throw new DomainValidationError(
      'date',
      raw,
      `"${raw}" is not a valid date (use DD.MM.YYYY or YYYY-MM-DD).`
    );
  }
  return parsed;
}

/**
 * Parses an attempt number typed by the user.
 *
 * @throws DomainValidationError unless the input is 1, 2 or 3
 */
export function parseAttemptInput(raw: string): number {
  const text = raw.trim();
  if (!/^\d+$/.test(text)) {
    throw new DomainValidationError('attemptNumber', raw, `"${raw}" is not an attempt number.`);
  }
  const attemptNumber = Number(text);
  assertValidAttemptNumber(attemptNumber);
  return attemptNumber;
}
