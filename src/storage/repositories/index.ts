/**
 * Repository Layer - Barrel Export
 *
 * @example
 * ```typescript
 * import { JsonProgramRepository, type ProgramRepository } from '../storage/repositories';
 *
 * const repo: ProgramRepository = new JsonProgramRepository('./data/program.json');
 * ```
 */

export type { ProgramRepository } from './base';

export {
  JsonProgramRepository,
  type JsonProgramRepositoryOptions,
} from './json-program.repository';
