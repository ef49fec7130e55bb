/**
 * Interactive Mode
 *
 * The menu-driven console session, and the default command of the CLI:
 *
 * 1) show the dashboard
 * 2) list all modules
 * 3) list open exams
 * 4) enter or change a grade
 * 5) schedule or change an exam date
 * 6) save
 * 0) quit
 *
 * Edits are saved right away when auto-save is on. A failed auto-save keeps
 * the changes marked as unsaved; quitting with unsaved changes asks whether
 * to save first.
 *
 * When several modules share a code, the user picks one from a numbered
 * list.
 *
 * Usage (via CLI):
 * ```bash
 * study-dashboard            # same as `study-dashboard interactive`
 * ```
 */

import type { DashboardService } from '../../core/dashboard';
import { formatDisplayDate, today } from '../../core/dates';
import {
  findModulesByCode,
  findOrCreateAttempt,
  parseAttemptInput,
  parseDateInput,
  parseGradeInput,
  setExamDate,
  setGrade,
  type FindOrCreateAttemptResult,
} from '../../core/editing';
import { DomainValidationError, type ExamAttempt, type Program, type StudyModule } from '../../core/models';
import type { ProgramRepository } from '../../storage';
import type { ConsoleIO } from '../utils/console-io';
import { formatGrade } from '../utils/format';
import { dim, green, red, yellow } from '../utils/terminal';
import type { DashboardView } from '../views/dashboard-view';
import { renderMenu, renderModuleList, renderOpenExams } from '../views/list-views';

export interface InteractiveControllerOptions {
  repository: ProgramRepository;
  io: ConsoleIO;
  service: DashboardService;
  view: DashboardView;
  /** Save after every successful edit */
  autoSave: boolean;
  /** Fixed reference date; when null the user is asked at startup */
  referenceDate: Date | null;
}

const YES_ANSWERS = ['y', 'yes', 'j', 'ja'];

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class InteractiveController {
  private readonly repository: ProgramRepository;
  private readonly io: ConsoleIO;
  private readonly service: DashboardService;
  private readonly view: DashboardView;
  private readonly autoSave: boolean;
  private readonly referenceDate: Date | null;

  private asOf: Date = today();
  private hasUnsavedChanges = false;

  constructor(options: InteractiveControllerOptions) {
    this.repository = options.repository;
    this.io = options.io;
    this.service = options.service;
    this.view = options.view;
    this.autoSave = options.autoSave;
    this.referenceDate = options.referenceDate;
  }

  /** Whether edits have been made since the last successful save. */
  get unsaved(): boolean {
    return this.hasUnsavedChanges;
  }

  /**
   * Loads the program and runs the menu loop until the user quits or
   * input ends.
   */
  async run(): Promise<void> {
    let program: Program;
    try {
      program = await this.repository.load();
    } catch (error) {
      this.io.print(red(`Error loading data: ${describeError(error)}`));
      return;
    }

    this.asOf = this.referenceDate ?? (await this.askReferenceDate());
    this.io.print(`Study dashboard started (${program.name}).`);

    for (;;) {
      for (const line of renderMenu()) {
        this.io.print(line);
      }
      const choice = await this.io.prompt('Choice: ');
      if (choice === null) {
        await this.quit(program);
        return;
      }

      switch (choice.trim()) {
        case '1':
          this.printLines(this.view.render(this.service.buildState(program, this.asOf)));
          break;
        case '2':
          this.printLines(renderModuleList(program, this.asOf));
          break;
        case '3':
          this.printLines(renderOpenExams(program, this.asOf));
          break;
        case '4':
          await this.enterGrade(program);
          break;
        case '5':
          await this.scheduleExam(program);
          break;
        case '6':
          await this.save(program);
          break;
        case '0':
          await this.quit(program);
          return;
        default:
          this.io.print(yellow('Invalid choice.'));
      }
    }
  }

  private async askReferenceDate(): Promise<Date> {
    const answer = await this.io.prompt('Reference date (DD.MM.YYYY, blank = today): ');
    try {
      return parseDateInput(answer ?? '') ?? today();
    } catch (error) {
      if (error instanceof DomainValidationError) {
        this.io.print(yellow('Invalid date. Using today.'));
        return today();
      }
      throw error;
    }
  }

  private async enterGrade(program: Program): Promise<void> {
    const attempt = await this.promptForAttempt(program);
    if (attempt === null) {
      return;
    }

    const raw = await this.io.prompt(
      `Grade (1,0..5,0), blank = clear (current: ${formatGrade(attempt.grade)}): `
    );
    if (raw === null) {
      return;
    }

    let grade: number | null;
    try {
      grade = parseGradeInput(raw);
      setGrade(attempt, grade);
    } catch (error) {
      if (error instanceof DomainValidationError) {
        this.io.print(red(error.message));
        return;
      }
      throw error;
    }

    if (grade === null) {
      this.io.print(green('Grade cleared.'));
    } else {
      this.io.print(green(`Grade set: ${formatGrade(grade)} (${attempt.isPassed() ? 'passed' : 'failed'})`));
    }
    await this.recordChange(program);
  }

  private async scheduleExam(program: Program): Promise<void> {
    const attempt = await this.promptForAttempt(program);
    if (attempt === null) {
      return;
    }

    const current = attempt.date ? formatDisplayDate(attempt.date) : '-';
    const raw = await this.io.prompt(
      `Exam date (DD.MM.YYYY or YYYY-MM-DD), blank = clear (current: ${current}): `
    );
    if (raw === null) {
      return;
    }

    let date: Date | null;
    try {
      date = parseDateInput(raw);
      setExamDate(attempt, date);
    } catch (error) {
      if (error instanceof DomainValidationError) {
        this.io.print(red(error.message));
        return;
      }
      throw error;
    }

    this.io.print(green(date === null ? 'Exam date cleared.' : `Exam date set: ${formatDisplayDate(date)}`));
    await this.recordChange(program);
  }

  /**
   * Asks for module code and attempt number; creates the attempt when the
   * module has room for it. Returns null when the user cancels or the
   * input is invalid (after telling them why).
   */
  private async promptForAttempt(program: Program): Promise<ExamAttempt | null> {
    const code = (await this.io.prompt('Module code: '))?.trim();
    if (!code) {
      return null;
    }

    const matches = findModulesByCode(program, code);
    if (matches.length === 0) {
      this.io.print(yellow('Module not found.'));
      return null;
    }
    const module = matches.length > 1 ? await this.chooseModule(matches) : matches[0];
    if (module === null) {
      return null;
    }

    const rawAttempt = await this.io.prompt('Attempt (1..3): ');
    if (rawAttempt === null) {
      return null;
    }

    let result: FindOrCreateAttemptResult;
    try {
      result = findOrCreateAttempt(module, parseAttemptInput(rawAttempt));
    } catch (error) {
      if (error instanceof DomainValidationError) {
        this.io.print(yellow(error.message));
        return null;
      }
      throw error;
    }

    switch (result.outcome) {
      case 'limit-reached':
        this.io.print(yellow(`At most ${result.maxAttempts} exam attempts per module are allowed.`));
        return null;
      case 'created':
        this.io.print(dim(`Note: created attempt ${result.attempt.attemptNumber} for ${module.code}.`));
        // A new attempt is an edit even if the user cancels the next prompt.
        this.hasUnsavedChanges = true;
        return result.attempt;
      case 'existing':
        return result.attempt;
    }
  }

  private async chooseModule(modules: StudyModule[]): Promise<StudyModule | null> {
    this.io.print('');
    this.io.print(`Several modules with code '${modules[0].code}' found:`);
    modules.forEach((m, i) => {
      this.io.print(`  ${i + 1}) ${m.title} (semester ${m.recommendedSemester}, ${m.credits} credits)`);
    });

    const raw = (await this.io.prompt(`Choose module (1-${modules.length}, 0 = cancel): `))?.trim() ?? '0';
    if (!/^\d+$/.test(raw)) {
      this.io.print(yellow('Invalid input.'));
      return null;
    }
    const choice = Number(raw);
    if (choice === 0) {
      return null;
    }
    if (choice > modules.length) {
      this.io.print(yellow('Invalid choice.'));
      return null;
    }
    return modules[choice - 1];
  }

  private async recordChange(program: Program): Promise<void> {
    this.hasUnsavedChanges = true;
    if (!this.autoSave) {
      return;
    }
    try {
      await this.repository.save(program);
      this.hasUnsavedChanges = false;
    } catch (error) {
      this.io.print(yellow(`Auto-save failed: ${describeError(error)}. Choose 6 to retry.`));
    }
  }

  private async save(program: Program): Promise<void> {
    try {
      await this.repository.save(program);
      this.hasUnsavedChanges = false;
      this.io.print(green('Data saved.'));
    } catch (error) {
      this.io.print(red(`Error while saving: ${describeError(error)}`));
    }
  }

  private async quit(program: Program): Promise<void> {
    if (this.hasUnsavedChanges) {
      const answer = await this.io.prompt('There are unsaved changes! Save now? (y/n): ');
      if (answer !== null && YES_ANSWERS.includes(answer.trim().toLowerCase())) {
        await this.save(program);
      }
    }
    this.io.print('Exiting.');
  }

  private printLines(lines: string[]): void {
    for (const line of lines) {
      this.io.print(line);
    }
  }
}

/**
 * Runs the interactive mode and releases the console afterwards.
 */
export async function runInteractiveCommand(options: InteractiveControllerOptions): Promise<void> {
  try {
    await new InteractiveController(options).run();
  } finally {
    options.io.close();
  }
}
