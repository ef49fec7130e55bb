/**
 * JSON Program Repository
 *
 * Keeps the whole program in a single JSON file. Loading reads and parses
 * the file and builds the domain graph through {@link ProgramSerializer};
 * saving serializes the graph and replaces the file.
 *
 * Every load failure surfaces as a {@link ProgramLoadError} whose `kind`
 * tells the caller what went wrong, and every write failure as a
 * {@link ProgramSaveError}. Non-fatal findings in the file (duplicate module
 * codes, unknown exam types) are logged as warnings.
 *
 * @example
 * ```typescript
 * const repo = new JsonProgramRepository('./data/program.json');
 * const program = await repo.load();
 * // ... edit ...
 * await repo.save(program);
 * ```
 */

import type { Program } from '../../core/models';
import { createLogger, type Logger } from '../../logger';
import { ProgramLoadError, ProgramSaveError } from '../errors';
import { FileStorage, type TextStorage } from '../file-storage';
import { ProgramSerializer } from '../program-serializer';
import type { ProgramRepository } from './base';

/**
 * Collaborators of the repository; all default to the real implementations.
 */
export interface JsonProgramRepositoryOptions {
  storage?: TextStorage;
  serializer?: ProgramSerializer;
  logger?: Logger;
}

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class JsonProgramRepository implements ProgramRepository {
  private readonly storage: TextStorage;
  private readonly serializer: ProgramSerializer;
  private readonly logger: Logger;

  /**
   * @param path - Location of the JSON data file
   */
  constructor(
    readonly path: string,
    options: JsonProgramRepositoryOptions = {}
  ) {
    this.storage = options.storage ?? new FileStorage();
    this.serializer = options.serializer ?? new ProgramSerializer();
    this.logger = options.logger ?? createLogger('[Storage]');
  }

  async load(): Promise<Program> {
    let raw: string;
    try {
      raw = await this.storage.read(this.path);
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        throw new ProgramLoadError(`Data file not found: ${this.path}`, 'not-found', error);
      }
      throw new ProgramLoadError(
        `Could not read data file ${this.path}: ${errorMessage(error)}`,
        'unreadable',
        error
      );
    }

    const { program, warnings } = this.serializer.deserialize(raw);
    for (const warning of warnings) {
      this.logger.warn(warning);
    }
    this.logger.debug(
      `Loaded "${program.name}" (${program.semesters.length} semesters, ${program.modules().length} modules) from ${this.path}`
    );
    return program;
  }

  async save(program: Program): Promise<void> {
    const content = this.serializer.serialize(program);
    try {
      await this.storage.write(this.path, content);
    } catch (error) {
      throw new ProgramSaveError(`Could not write data file ${this.path}: ${errorMessage(error)}`, error);
    }
    this.logger.debug(`Saved "${program.name}" to ${this.path}`);
  }
}
