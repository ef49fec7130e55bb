/**
 * Storage Module - Barrel Export
 *
 * Persistence of the program graph as a JSON document.
 */

export { ProgramLoadError, ProgramSaveError, type ProgramLoadErrorKind } from './errors';
export { FileStorage, type TextStorage } from './file-storage';
export {
  ProgramSerializer,
  parseEnum,
  programDocumentSchema,
  type DeserializeResult,
  type ProgramDocument,
  type SemesterDocument,
  type ModuleDocument,
  type AttemptDocument,
} from './program-serializer';
export {
  JsonProgramRepository,
  type JsonProgramRepositoryOptions,
  type ProgramRepository,
} from './repositories';
