/**
 * Dashboard View
 *
 * Renders a {@link DashboardState} as a bordered text box. The renderer
 * returns lines instead of printing them, so commands decide where the
 * output goes and tests can compare it line by line.
 *
 * Sections, top to bottom: header, KPI block in two columns, semester
 * table, critical modules and the exam counts. Text that does not fit its
 * cell is cut, except the header lines, which wrap.
 */

import { formatDisplayDate } from '../../core/dates';
import type { DashboardState } from '../../core/dashboard';
import { fit, formatDecimal, formatGrade, formatSigned, progressBar, wrapText } from '../utils/format';

/** Narrowest box the layout supports. */
export const MIN_DASHBOARD_WIDTH = 80;

export const DEFAULT_DASHBOARD_WIDTH = 120;

const SEMESTER_COLUMNS: readonly { title: string; width: number }[] = [
  { title: 'Semester', width: 9 },
  { title: 'Planned', width: 10 },
  { title: 'Earned', width: 9 },
  { title: 'Status', width: 25 },
];

const TITLE_LENGTH_LIMIT = 45;

export interface DashboardViewOptions {
  /** Total box width including borders; at least {@link MIN_DASHBOARD_WIDTH} */
  width?: number;
  /** Number of critical entries shown */
  criticalLimit?: number;
}

export class DashboardView {
  private readonly width: number;
  private readonly criticalLimit: number;

  constructor(options: DashboardViewOptions = {}) {
    this.width = Math.max(MIN_DASHBOARD_WIDTH, options.width ?? DEFAULT_DASHBOARD_WIDTH);
    this.criticalLimit = options.criticalLimit ?? 8;
  }

  render(state: DashboardState): string[] {
    const heavy = `+${'═'.repeat(this.width - 2)}+`;
    const light = `+${'─'.repeat(this.width - 2)}+`;
    const lines: string[] = [];

    // Header
    lines.push(heavy);
    lines.push(...this.wrapped(`Study Dashboard - ${state.programName} (${state.studyModelText})`));
    lines.push(
      ...this.wrapped(
        `Start: ${formatDisplayDate(state.startDate)}   ` +
          `Semester: ${state.currentSemester} / ${state.totalSemesters}   ` +
          `Target credits: ${state.targetCredits}`
      )
    );
    lines.push(heavy);

    // KPIs
    const target = formatGrade(state.gradeTarget);
    lines.push(this.twoColumns('PROGRESS', 'GRADES & ACHIEVEMENTS'));
    lines.push(
      this.twoColumns(
        `${progressBar(state.progressPercent, 20)} ${state.earnedCredits}/${state.targetCredits} credits ` +
          `(${Math.round(state.progressPercent)}%)`,
        `Average grade: ${formatGrade(state.averageGrade)} (target ${target})`
      )
    );
    const deviationMark = state.deviation >= 0 ? '✓' : 'X';
    lines.push(
      this.twoColumns(
        `Target to date: ${state.targetCreditsToDate} credits   ` +
          `Deviation: ${formatSigned(state.deviation)} credits ${deviationMark}`,
        `Modules > ${target}: ${state.modulesAboveGradeTarget}`
      )
    );
    lines.push(light);

    // Semester table
    lines.push(...this.semesterTable(state));
    lines.push(light);

    // Critical modules
    lines.push(
      this.row(
        `CRITICAL MODULES & EXAMS (${state.criticalModuleCount} due within ` +
          `${state.criticalHorizonDays} days or overdue)`
      )
    );
    if (state.criticalEntries.length === 0) {
      lines.push(this.row(' No critical entries'));
    } else {
      for (const entry of state.criticalEntries.slice(0, this.criticalLimit)) {
        const mark = entry.isOverdue ? 'X' : '+';
        const title = entry.title.slice(0, TITLE_LENGTH_LIMIT);
        lines.push(this.row(` ${mark} ${title} (${entry.moduleCode})  ${entry.statusText}`));
      }
    }

    const examMark = state.examCounts.overdue > 0 ? 'X' : '✓';
    lines.push(
      this.row(
        `Open exams: ${state.examCounts.open}    ` +
          `Overdue exams: ${state.examCounts.overdue} ${examMark}`
      )
    );
    lines.push(heavy);

    return lines;
  }

  private semesterTable(state: DashboardState): string[] {
    const [semester, planned, earned, status] = SEMESTER_COLUMNS;
    const out = [
      this.row(SEMESTER_COLUMNS.map((c) => c.title.padEnd(c.width)).join(' │ ')),
      this.row(SEMESTER_COLUMNS.map((c) => '─'.repeat(c.width)).join('─│─')),
    ];

    for (const row of state.semesterRows) {
      out.push(
        this.row(
          [
            String(row.number).padEnd(semester.width),
            formatDecimal(row.plannedCredits).padStart(planned.width),
            String(row.earnedCredits).padStart(earned.width),
            row.statusText.padEnd(status.width),
          ].join(' │ ')
        )
      );
    }

    return out;
  }

  /** One bordered line; long text is cut. */
  private row(text: string): string {
    return `│${fit(text, this.width - 2)}│`;
  }

  /** Bordered lines with word wrap. */
  private wrapped(text: string): string[] {
    return wrapText(text, this.width - 2).map((line) => this.row(line));
  }

  private twoColumns(left: string, right: string): string {
    const inner = this.width - 2;
    const separator = ' │ ';
    const leftWidth = Math.floor((inner - separator.length) / 2);
    const rightWidth = inner - separator.length - leftWidth;
    return `│${fit(left, leftWidth)}${separator}${fit(right, rightWidth)}│`;
  }
}
