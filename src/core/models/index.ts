/**
 * Core Domain Models - Barrel Export
 *
 * @example
 * ```typescript
 * import { Program, Semester, StudyModule, ExamAttempt } from '../core/models';
 * ```
 */

export type {
  DegreeType,
  StudyModel,
  ExamType,
  ExamStatus,
  ModuleStatus,
} from './types';
export {
  DEGREE_TYPES,
  STUDY_MODELS,
  EXAM_TYPES,
  STUDY_MODEL_LABELS,
  PASSING_GRADE_LIMIT,
  MIN_GRADE,
  MAX_GRADE,
  MAX_ATTEMPTS,
} from './types';

export { DomainValidationError } from './errors';

export {
  ExamAttempt,
  examStatus,
  assertValidGrade,
  assertValidAttemptNumber,
  type ExamAttemptInput,
} from './exam-attempt';
export {
  StudyModule,
  moduleStatus,
  moduleGrade,
  nextRelevantExam,
  type StudyModuleInput,
} from './study-module';
export { Semester, type SemesterInput } from './semester';
export {
  Program,
  DEFAULT_GRADE_TARGET,
  DEFAULT_CRITICAL_HORIZON_DAYS,
  type ProgramInput,
} from './program';
