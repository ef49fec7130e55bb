/**
 * Editing commands: `grade` and `schedule`.
 *
 * Each command loads the program, applies one edit and saves it back.
 * Omitting the value clears the grade or date.
 *
 * Usage (via CLI):
 * ```bash
 * study-dashboard grade CS101 1 2,3
 * study-dashboard grade CS101 2          # clears the grade of attempt 2
 * study-dashboard schedule CS101 1 15.03.2024
 * study-dashboard grade CS503 1 1,7 --pick 2   # second module with that code
 * ```
 */

import { formatDisplayDate } from '../../core/dates';
import {
  findModulesByCode,
  findOrCreateAttempt,
  parseAttemptInput,
  parseDateInput,
  parseGradeInput,
  setExamDate,
  setGrade,
} from '../../core/editing';
import type { ExamAttempt, Program, StudyModule } from '../../core/models';
import { formatGrade } from '../utils/format';
import { dim, green } from '../utils/terminal';
import { CommandError, type CommandContext } from './context';

export interface EditCommandOptions {
  /** 1-based choice among modules sharing the code */
  pick?: string;
}

function selectModule(program: Program, code: string, pick: string | undefined): StudyModule {
  const matches = findModulesByCode(program, code);
  if (matches.length === 0) {
    throw new CommandError(`Module "${code}" not found.`);
  }

  if (pick === undefined) {
    if (matches.length > 1) {
      const choices = matches
        .map((m, i) => `  ${i + 1}) ${m.title} (semester ${m.recommendedSemester}, ${m.credits} credits)`)
        .join('\n');
      throw new CommandError(
        `${matches.length} modules have the code "${code}"; choose one with --pick <n>:\n${choices}`
      );
    }
    return matches[0];
  }

  const index = Number(pick);
  if (!Number.isInteger(index) || index < 1 || index > matches.length) {
    throw new CommandError(`--pick must be between 1 and ${matches.length}, got "${pick}".`);
  }
  return matches[index - 1];
}

function selectAttempt(ctx: CommandContext, module: StudyModule, attemptText: string): ExamAttempt {
  const result = findOrCreateAttempt(module, parseAttemptInput(attemptText));
  switch (result.outcome) {
    case 'limit-reached':
      throw new CommandError(`At most ${result.maxAttempts} exam attempts per module are allowed.`);
    case 'created':
      ctx.out.print(dim(`Created attempt ${result.attempt.attemptNumber} for ${module.code}.`));
      return result.attempt;
    case 'existing':
      return result.attempt;
  }
}

/**
 * Sets or clears the grade of one attempt and saves.
 */
export async function runGradeCommand(
  ctx: CommandContext,
  code: string,
  attemptText: string,
  gradeText: string | undefined,
  options: EditCommandOptions = {}
): Promise<void> {
  const program = await ctx.repository.load();
  const module = selectModule(program, code, options.pick);
  // Parse first: invalid input must not leave a created attempt behind.
  const grade = parseGradeInput(gradeText ?? '');
  const attempt = selectAttempt(ctx, module, attemptText);

  setGrade(attempt, grade);
  await ctx.repository.save(program);

  if (grade === null) {
    ctx.out.print(green(`Grade cleared for ${module.code}, attempt ${attempt.attemptNumber}.`));
  } else {
    const verdict = attempt.isPassed() ? 'passed' : 'failed';
    ctx.out.print(
      green(`Grade set for ${module.code}, attempt ${attempt.attemptNumber}: ${formatGrade(grade)} (${verdict})`)
    );
  }
}

/**
 * Sets or clears the date of one attempt and saves.
 */
export async function runScheduleCommand(
  ctx: CommandContext,
  code: string,
  attemptText: string,
  dateText: string | undefined,
  options: EditCommandOptions = {}
): Promise<void> {
  const program = await ctx.repository.load();
  const module = selectModule(program, code, options.pick);
  const date = parseDateInput(dateText ?? '');
  const attempt = selectAttempt(ctx, module, attemptText);

  setExamDate(attempt, date);
  await ctx.repository.save(program);

  if (date === null) {
    ctx.out.print(green(`Exam date cleared for ${module.code}, attempt ${attempt.attemptNumber}.`));
  } else {
    ctx.out.print(
      green(`Exam date set for ${module.code}, attempt ${attempt.attemptNumber}: ${formatDisplayDate(date)}`)
    );
  }
}
