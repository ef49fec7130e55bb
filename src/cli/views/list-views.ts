/**
 * Plain list views: all modules, open exams and the interactive menu.
 * Like the dashboard view, each function returns lines.
 */

import { formatDisplayDate } from '../../core/dates';
import type { Program, StudyModule } from '../../core/models';
import { formatGrade } from '../utils/format';
import { bold, formatExamStatus } from '../utils/terminal';

/**
 * One line per module, ordered by semester number and then by recommended
 * semester. Module status is shown as of `asOf`.
 */
export function renderModuleList(program: Program, asOf: Date): string[] {
  const rows: { semester: number; module: StudyModule }[] = [];
  for (const semester of program.semesters) {
    for (const module of semester.modules) {
      rows.push({ semester: semester.number, module });
    }
  }
  rows.sort(
    (a, b) => a.semester - b.semester || a.module.recommendedSemester - b.module.recommendedSemester
  );

  const lines = ['', bold('=== ALL MODULES ===')];
  for (const { semester, module } of rows) {
    lines.push(
      `  Sem ${semester} | ${module.code.padEnd(20)} | ${module.title.padEnd(40)} | ` +
        `Credits ${String(module.credits).padStart(2)} | ` +
        `Status: ${module.status(asOf).padEnd(15)} | Grade: ${formatGrade(module.grade())}`
    );
  }
  lines.push('');
  return lines;
}

/**
 * One line per ungraded attempt, in program order, with the status
 * colored by urgency.
 */
export function renderOpenExams(program: Program, asOf: Date): string[] {
  const lines = ['', bold('=== OPEN EXAMS ===')];
  let found = false;

  for (const module of program.modules()) {
    for (const attempt of module.attempts) {
      if (attempt.isGraded()) {
        continue;
      }
      const date = attempt.date ? formatDisplayDate(attempt.date) : '-';
      lines.push(
        `  ${module.code.padEnd(20)} | ${module.title.padEnd(40)} | ` +
          `Attempt ${attempt.attemptNumber} | ${date.padEnd(10)} | ${formatExamStatus(attempt.status(asOf))}`
      );
      found = true;
    }
  }

  if (!found) {
    lines.push('No open exams.');
  }
  lines.push('');
  return lines;
}

const MENU_ITEMS: readonly [string, string][] = [
  ['1', 'Show dashboard'],
  ['2', 'List modules'],
  ['3', 'Show open exams'],
  ['4', 'Enter/change grade'],
  ['5', 'Schedule/change exam date'],
  ['6', 'Save'],
  ['0', 'Quit'],
];

const MENU_WIDTH = 39;

/** The main menu of the interactive mode. */
export function renderMenu(): string[] {
  const border = '═'.repeat(MENU_WIDTH);
  return [
    '',
    `╔${border}╗`,
    `║${'MAIN MENU'.padStart(21).padEnd(MENU_WIDTH)}║`,
    `╠${border}╣`,
    ...MENU_ITEMS.map(([key, label]) => `║${`  ${key}) ${label}`.padEnd(MENU_WIDTH)}║`),
    `╚${border}╝`,
  ];
}
