/**
 * Program Repository Interface
 *
 * The contract between the application and wherever a program is kept.
 * Persistence is whole-graph: `load` returns a fully constructed program
 * whose entities already satisfy their invariants, and `save` writes the
 * whole graph back. There is no partial update and no transaction.
 *
 * @example
 * ```typescript
 * class InMemoryProgramRepository implements ProgramRepository {
 *   constructor(private program: Program) {}
 *   async load() { return this.program; }
 *   async save(program: Program) { this.program = program; }
 * }
 * ```
 */

import type { Program } from '../../core/models';

export interface ProgramRepository {
  /**
   * Loads the program.
   *
   * @throws ProgramLoadError when the data is missing, malformed or violates
   *   a domain invariant
   */
  load(): Promise<Program>;

  /**
   * Persists the whole program graph.
   *
   * @throws ProgramSaveError when writing fails
   */
  save(program: Program): Promise<void>;
}
