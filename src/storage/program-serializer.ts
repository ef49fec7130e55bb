/**
 * Program JSON Serializer
 *
 * Maps between the JSON document kept on disk and the domain object graph.
 * The domain stays free of any JSON detail; this module owns the document
 * shape, date encoding and the tolerant reading of enumerated values.
 *
 * Reading is forgiving where old or hand-edited files tend to differ:
 * - enum values match case-insensitively and ignore spaces, hyphens and
 *   underscores ('Written Exam', 'written_exam' and 'WRITTEN-EXAM' are the
 *   same exam type); unknown exam types become 'other'
 * - a missing degree defaults to 'bachelor', a missing study model to
 *   'part-time-I'
 * - a missing attempt id is derived from the module code
 *
 * Everything the domain forbids (four attempts, a grade of 6.0, ...) is
 * still rejected, with the constructor's message.
 *
 * Dates are stored as ISO `YYYY-MM-DD` strings; absent dates are `null`.
 */

import { z } from 'zod';
import { formatIsoDate, parseIsoDate } from '../core/dates';
import {
  DEGREE_TYPES,
  DomainValidationError,
  EXAM_TYPES,
  ExamAttempt,
  Program,
  STUDY_MODELS,
  Semester,
  StudyModule,
  type DegreeType,
  type ExamType,
  type StudyModel,
} from '../core/models';
import { ProgramLoadError } from './errors';

// =============================================================================
// Document Schema
// =============================================================================

const optionalText = z.string().nullable().optional();

const attemptDocumentSchema = z.object({
  id: optionalText,
  examType: optionalText,
  date: optionalText,
  attemptNumber: z.number(),
  grade: z.number().nullable().optional(),
});

const moduleDocumentSchema = z.object({
  code: optionalText,
  title: z.string(),
  credits: z.number(),
  recommendedSemester: z.number(),
  attempts: z.array(attemptDocumentSchema),
});

const semesterDocumentSchema = z.object({
  number: z.number(),
  plannedCredits: z.number(),
  startDate: optionalText,
  endDate: optionalText,
  modules: z.array(moduleDocumentSchema).default([]),
});

export const programDocumentSchema = z.object({
  name: z.string(),
  degree: optionalText,
  studyModel: optionalText,
  targetCredits: z.number(),
  durationMonths: z.number(),
  startDate: z.string(),
  semesters: z.array(semesterDocumentSchema),
});

/** The program as written to disk. */
export type ProgramDocument = z.output<typeof programDocumentSchema>;
export type SemesterDocument = z.output<typeof semesterDocumentSchema>;
export type ModuleDocument = z.output<typeof moduleDocumentSchema>;
export type AttemptDocument = z.output<typeof attemptDocumentSchema>;

// =============================================================================
// Tolerant Enum Parsing
// =============================================================================

function normalizeKey(text: string): string {
  return text.trim().toLowerCase().replace(/[\s_-]+/g, '');
}

const DEGREE_ALIASES: Record<string, DegreeType> = {
  bsc: 'bachelor',
  ba: 'bachelor',
  beng: 'bachelor',
  msc: 'master',
  ma: 'master',
  meng: 'master',
};

const STUDY_MODEL_ALIASES: Record<string, StudyModel> = {
  ft: 'full-time',
  parttime1: 'part-time-I',
  parttime2: 'part-time-II',
  pt1: 'part-time-I',
  pt2: 'part-time-II',
};

const EXAM_TYPE_ALIASES: Record<string, ExamType> = {
  exam: 'written-exam',
  written: 'written-exam',
  oral: 'oral-exam',
  workbook: 'advanced-workbook',
  presentation: 'project-presentation',
  bachelorthesis: 'thesis',
  masterthesis: 'thesis',
};

/**
 * Maps free text onto one of `values`.
 *
 * Matching ignores case, whitespace, hyphens and underscores, then falls
 * back to `aliases`. Blank or unknown input yields null.
 *
 * @example
 * ```typescript
 * parseEnum('Written Exam', EXAM_TYPES, {}); // 'written-exam'
 * parseEnum('banana', EXAM_TYPES, {});       // null
 * ```
 */
export function parseEnum<T extends string>(
  raw: string | null | undefined,
  values: readonly T[],
  aliases: Readonly<Record<string, T>>
): T | null {
  if (raw === null || raw === undefined) {
    return null;
  }
  const key = normalizeKey(raw);
  if (!key) {
    return null;
  }
  const match = values.find((v) => normalizeKey(v) === key);
  if (match !== undefined) {
    return match;
  }
  return Object.prototype.hasOwnProperty.call(aliases, key) ? aliases[key] : null;
}

// =============================================================================
// Serializer
// =============================================================================

/**
 * Result of reading a document: the program plus non-fatal findings
 * worth showing to the user (duplicate codes, unknown enum values).
 */
export interface DeserializeResult {
  program: Program;
  warnings: string[];
}

/**
 * Converts programs to and from their JSON document form.
 */
export class ProgramSerializer {
  /**
   * Renders the program as pretty-printed JSON (2-space indent, trailing
   * newline).
   */
  serialize(program: Program): string {
    return `${JSON.stringify(this.toDocument(program), null, 2)}\n`;
  }

  /**
   * Parses JSON text into a program.
   *
   * @throws ProgramLoadError with kind 'invalid-json', 'invalid-document' or
   *   'invariant-violation'
   */
  deserialize(raw: string): DeserializeResult {
    let payload: unknown;
    try {
      payload = JSON.parse(raw);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ProgramLoadError(`Data file is not valid JSON: ${reason}`, 'invalid-json', error);
    }

    const parsed = programDocumentSchema.safeParse(payload);
    if (!parsed.success) {
      const details = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new ProgramLoadError(`Data file has an unexpected shape: ${details}`, 'invalid-document', parsed.error);
    }

    return this.fromDocument(parsed.data);
  }

  /**
   * Maps a program onto its document form.
   */
  toDocument(program: Program): ProgramDocument {
    return {
      name: program.name,
      degree: program.degree,
      studyModel: program.studyModel,
      targetCredits: program.targetCredits,
      durationMonths: program.durationMonths,
      startDate: formatIsoDate(program.startDate),
      semesters: program.semesters.map((s) => ({
        number: s.number,
        plannedCredits: s.plannedCredits,
        startDate: s.startDate ? formatIsoDate(s.startDate) : null,
        endDate: s.endDate ? formatIsoDate(s.endDate) : null,
        modules: s.modules.map((m) => ({
          code: m.code,
          title: m.title,
          credits: m.credits,
          recommendedSemester: m.recommendedSemester,
          attempts: m.attempts.map((a) => ({
            id: a.id,
            examType: a.examType,
            date: a.date ? formatIsoDate(a.date) : null,
            attemptNumber: a.attemptNumber,
            grade: a.grade,
          })),
        })),
      })),
    };
  }

  /**
   * Builds the domain graph from a validated document.
   *
   * @throws ProgramLoadError with kind 'invalid-document' for unparseable
   *   dates and 'invariant-violation' when a constructor rejects the data
   */
  fromDocument(doc: ProgramDocument): DeserializeResult {
    const warnings: string[] = [];

    try {
      const program = new Program({
        name: doc.name,
        degree: parseEnum(doc.degree, DEGREE_TYPES, DEGREE_ALIASES) ?? 'bachelor',
        studyModel: parseEnum(doc.studyModel, STUDY_MODELS, STUDY_MODEL_ALIASES) ?? 'part-time-I',
        targetCredits: doc.targetCredits,
        durationMonths: doc.durationMonths,
        startDate: requireDate(doc.startDate, 'startDate'),
        semesters: doc.semesters.map((s, i) => this.semesterFromDocument(s, `semesters.${i}`, warnings)),
      });

      warnings.push(...findDuplicateCodes(program));
      return { program, warnings };
    } catch (error) {
      if (error instanceof DomainValidationError) {
        throw new ProgramLoadError(`Data file violates a program rule: ${error.message}`, 'invariant-violation', error);
      }
      throw error;
    }
  }

  private semesterFromDocument(doc: SemesterDocument, path: string, warnings: string[]): Semester {
    return new Semester({
      number: doc.number,
      plannedCredits: doc.plannedCredits,
      startDate: optionalDate(doc.startDate, `${path}.startDate`),
      endDate: optionalDate(doc.endDate, `${path}.endDate`),
      modules: doc.modules.map((m, i) => this.moduleFromDocument(m, `${path}.modules.${i}`, warnings)),
    });
  }

  private moduleFromDocument(doc: ModuleDocument, path: string, warnings: string[]): StudyModule {
    const code = (doc.code ?? '').trim();
    const module = new StudyModule({
      code,
      title: doc.title,
      credits: doc.credits,
      recommendedSemester: doc.recommendedSemester,
      attempts: doc.attempts.map((a, i) => this.attemptFromDocument(a, code, `${path}.attempts.${i}`, warnings)),
    });

    for (const attemptNumber of module.duplicateAttemptNumbers()) {
      warnings.push(`Module "${code}" has more than one attempt numbered ${attemptNumber}`);
    }
    return module;
  }

  private attemptFromDocument(
    doc: AttemptDocument,
    moduleCode: string,
    path: string,
    warnings: string[]
  ): ExamAttempt {
    let examType = parseEnum(doc.examType, EXAM_TYPES, EXAM_TYPE_ALIASES);
    if (examType === null) {
      if (doc.examType) {
        warnings.push(`Unknown exam type "${doc.examType}" in module "${moduleCode}", using "other"`);
      }
      examType = 'other';
    }

    const id = (doc.id ?? '').trim();
    return new ExamAttempt({
      id: id || `${moduleCode}-A${doc.attemptNumber}`,
      examType,
      date: optionalDate(doc.date, `${path}.date`),
      attemptNumber: doc.attemptNumber,
      grade: doc.grade ?? null,
    });
  }
}

function requireDate(text: string, path: string): Date {
  const date = parseIsoDate(text.trim());
  if (date === null) {
    throw new ProgramLoadError(`${path}: "${text}" is not a date in YYYY-MM-DD form`, 'invalid-document');
  }
  return date;
}

function optionalDate(text: string | null | undefined, path: string): Date | null {
  if (text === null || text === undefined || text.trim() === '') {
    return null;
  }
  return requireDate(text, path);
}

/**
 * Reports module codes used by more than one module.
 */
function findDuplicateCodes(program: Program): string[] {
  const counts = new Map<string, number>();
  for (const module of program.modules()) {
    if (module.code) {
      counts.set(module.code, (counts.get(module.code) ?? 0) + 1);
    }
  }
  return [...counts.entries()]
    .filter(([, count]) => count > 1)
    .map(([code, count]) => `Duplicate module code "${code}" (${count} modules)`);
}
