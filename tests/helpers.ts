/**
 * Test Helpers Module
 *
 * Builders for program graphs with sensible defaults, an in-memory
 * repository and a scripted console. Keeps the individual tests focused on
 * the values that matter to them.
 */

import { parseIsoDate } from '../src/core/dates';
import {
  ExamAttempt,
  Program,
  Semester,
  StudyModule,
  type DegreeType,
  type ExamType,
  type StudyModel,
} from '../src/core/models';
import type { ConsoleIO } from '../src/cli/utils/console-io';
import type { ProgramRepository } from '../src/storage';

// ============================================================================
// Date Utilities
// ============================================================================

/**
 * Parses a `YYYY-MM-DD` literal into a calendar date; throws on typos so a
 * broken fixture fails loudly.
 */
export function day(iso: string): Date {
  const date = parseIsoDate(iso);
  if (date === null) {
    throw new Error(`Bad test date: ${iso}`);
  }
  return date;
}

// ============================================================================
// Builders
// ============================================================================

export interface AttemptOverrides {
  attemptNumber?: number;
  examType?: ExamType;
  date?: string | null;
  grade?: number | null;
  id?: string;
}

export function buildAttempt(overrides: AttemptOverrides = {}, moduleCode = 'M1'): ExamAttempt {
  const attemptNumber = overrides.attemptNumber ?? 1;
  return new ExamAttempt({
    id: overrides.id ?? `${moduleCode}-A${attemptNumber}`,
    examType: overrides.examType ?? 'written-exam',
    date: overrides.date ? day(overrides.date) : null,
    attemptNumber,
    grade: overrides.grade ?? null,
  });
}

export interface ModuleOverrides {
  code?: string;
  title?: string;
  credits?: number;
  recommendedSemester?: number;
  /** Defaults to one unscheduled, ungraded attempt */
  attempts?: AttemptOverrides[];
}

export function buildModule(overrides: ModuleOverrides = {}): StudyModule {
  const code = overrides.code ?? 'M1';
  const attemptOverrides = overrides.attempts ?? [{}];
  return new StudyModule({
    code,
    title: overrides.title ?? `Module ${code}`,
    credits: overrides.credits ?? 5,
    recommendedSemester: overrides.recommendedSemester ?? 1,
    attempts: attemptOverrides.map((a, i) => buildAttempt({ attemptNumber: i + 1, ...a }, code)),
  });
}

export interface SemesterOverrides {
  number?: number;
  plannedCredits?: number;
  startDate?: string | null;
  endDate?: string | null;
  modules?: ModuleOverrides[];
}

export function buildSemester(overrides: SemesterOverrides = {}): Semester {
  return new Semester({
    number: overrides.number ?? 1,
    plannedCredits: overrides.plannedCredits ?? 30,
    startDate: overrides.startDate ? day(overrides.startDate) : null,
    endDate: overrides.endDate ? day(overrides.endDate) : null,
    modules: (overrides.modules ?? []).map((m) => buildModule(m)),
  });
}

export interface ProgramOverrides {
  name?: string;
  degree?: DegreeType;
  studyModel?: StudyModel;
  targetCredits?: number;
  durationMonths?: number;
  startDate?: string;
  /** Defaults to a single undated 30-credit semester */
  semesters?: SemesterOverrides[];
}

export function buildProgram(overrides: ProgramOverrides = {}): Program {
  const semesterOverrides = overrides.semesters ?? [{}];
  return new Program({
    name: overrides.name ?? 'Test Program',
    degree: overrides.degree ?? 'bachelor',
    studyModel: overrides.studyModel ?? 'full-time',
    targetCredits: overrides.targetCredits ?? 180,
    durationMonths: overrides.durationMonths ?? 36,
    startDate: day(overrides.startDate ?? '2024-01-01'),
    semesters: semesterOverrides.map((s, i) => buildSemester({ number: i + 1, ...s })),
  });
}

// ============================================================================
// Test Doubles
// ============================================================================

/**
 * Repository holding the program in memory. Counts saves and can be told
 * to fail them.
 */
export class InMemoryProgramRepository implements ProgramRepository {
  saveCount = 0;
  failSaves = false;

  constructor(private program: Program | Error) {}

  async load(): Promise<Program> {
    if (this.program instanceof Error) {
      throw this.program;
    }
    return this.program;
  }

  async save(program: Program): Promise<void> {
    if (this.failSaves) {
      throw new Error('disk full');
    }
    this.saveCount++;
    this.program = program;
  }
}

/**
 * Console that answers prompts from a fixed script and records everything
 * printed. Once the script runs out, prompts resolve with null (end of
 * input).
 */
export class ScriptedIO implements ConsoleIO {
  readonly output: string[] = [];
  readonly prompts: string[] = [];
  closed = false;
  private readonly answers: string[];

  constructor(answers: string[]) {
    this.answers = [...answers];
  }

  print(text: string): void {
    this.output.push(text);
  }

  async prompt(question: string): Promise<string | null> {
    this.prompts.push(question);
    return this.answers.shift() ?? null;
  }

  close(): void {
    this.closed = true;
  }
}
