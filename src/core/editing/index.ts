/**
 * Editing operations - Barrel Export
 */

export {
  setGrade,
  setExamDate,
  findOrCreateAttempt,
  findModulesByCode,
  parseGradeInput,
  parseDateInput,
  parseAttemptInput,
  type FindOrCreateAttemptResult,
} from './exam-editor';
