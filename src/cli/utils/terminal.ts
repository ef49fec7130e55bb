/**
 * Terminal Utilities for CLI Output Formatting
 *
 * ANSI escape code wrappers for colorizing and formatting terminal output,
 * plus a semantic formatter for exam statuses.
 *
 * Usage:
 * ```typescript
 * import { bold, green, formatExamStatus } from './terminal';
 *
 * console.log(bold('=== OPEN EXAMS ==='));
 * console.log(green('Data saved.'));
 * console.log(formatExamStatus('overdue'));
 * ```
 *
 * In non-TTY environments the codes pass through harmlessly.
 */

import type { ExamStatus } from '../../core/models';

// =============================================================================
// Text Style Modifiers
// =============================================================================

/**
 * Makes text bold/bright in the terminal.
 */
export const bold = (s: string): string => `\x1b[1m${s}\x1b[0m`;

/**
 * Makes text dim/faded in the terminal.
 * Use for secondary information like hints.
 */
export const dim = (s: string): string => `\x1b[2m${s}\x1b[0m`;

// =============================================================================
// Color Functions
// =============================================================================

/** Success messages and passed exams. */
export const green = (s: string): string => `\x1b[32m${s}\x1b[0m`;

/** Warnings and items needing attention. */
export const yellow = (s: string): string => `\x1b[33m${s}\x1b[0m`;

/** Errors and overdue exams. */
export const red = (s: string): string => `\x1b[31m${s}\x1b[0m`;

// =============================================================================
// Semantic Formatters
// =============================================================================

/**
 * Colors an exam status by urgency.
 *
 * @example
 * formatExamStatus('overdue'); // red "overdue"
 */
export function formatExamStatus(status: ExamStatus): string {
  switch (status) {
    case 'passed':
      return green(status);
    case 'failed':
    case 'overdue':
      return red(status);
    case 'registered':
      return yellow(status);
    case 'planned':
      return dim(status);
  }
}
