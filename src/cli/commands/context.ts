/**
 * Dependencies handed to every CLI command handler.
 */

import type { Config } from '../../config';
import type { ProgramRepository } from '../../storage';
import type { Printer } from '../utils/console-io';

export interface CommandContext {
  repository: ProgramRepository;
  config: Config;
  /** Reference date for statuses and KPIs */
  asOf: Date;
  out: Printer;
  /** Terminal width, when known; the dashboard box adapts to it */
  width?: number;
}

/**
 * A user-facing failure of a command: printed without a stack trace and
 * ends the process with a non-zero exit code.
 */
export class CommandError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CommandError';
  }
}
