#!/usr/bin/env node
/**
 * CLI Entry Point for the Study Dashboard
 *
 * Parses the command line, loads the configuration, creates the JSON
 * repository and routes to the command handlers.
 *
 * Available Commands:
 * - `dashboard` - Render the KPI dashboard
 * - `modules` - List all modules with status and grade
 * - `exams` - List ungraded exam attempts
 * - `grade <code> <attempt> [grade]` - Set or clear a grade
 * - `schedule <code> <attempt> [date]` - Set or clear an exam date
 * - `interactive` - Menu-driven session (default)
 *
 * Usage:
 * ```bash
 * study-dashboard dashboard --as-of 2024-03-01
 * study-dashboard --data ./my-program.json modules
 * study-dashboard grade CS101 1 2,3
 * study-dashboard
 * ```
 *
 * Configuration comes from environment variables (see `config.ts`);
 * `--data` overrides `STUDY_DATA_PATH`.
 */

import { Command } from 'commander';
import { loadConfig, type Config } from '../config';
import { today } from '../core/dates';
import { parseDateInput } from '../core/editing';
import { createLogger } from '../logger';
import { JsonProgramRepository } from '../storage';
import { CommandError, type CommandContext } from './commands/context';
import {
  createDashboardService,
  createDashboardView,
  runDashboardCommand,
  runExamsCommand,
  runModulesCommand,
} from './commands/dashboard';
import { runGradeCommand, runScheduleCommand, type EditCommandOptions } from './commands/edit';
import { runInteractiveCommand } from './commands/interactive';
import { consolePrinter, createReadlineIO } from './utils/console-io';
import { red } from './utils/terminal';

type GlobalOptions = {
  data?: string;
};

interface AsOfOptions {
  asOf?: string;
}

/**
 * Reference date from `--as-of`, else from the configuration.
 * Null when neither is set.
 */
function resolveReferenceDate(config: Config, asOfText: string | undefined): Date | null {
  if (asOfText !== undefined) {
    const parsed = parseDateInput(asOfText);
    if (parsed === null) {
      throw new CommandError('--as-of must not be empty.');
    }
    return parsed;
  }
  return config.dashboard.referenceDate;
}

function terminalWidth(): number | undefined {
  return process.stdout.isTTY ? process.stdout.columns : undefined;
}

/**
 * Builds the commander program. Every action loads the configuration
 * lazily so `--help` works even with a broken environment.
 */
export function createCli(): Command {
  const cli = new Command('study-dashboard')
    .description('Console dashboard for tracking progress through a degree program')
    .version('0.1.0')
    .option('-d, --data <path>', 'Path to the program JSON file (overrides STUDY_DATA_PATH)');

  const createContext = (asOfText: string | undefined): CommandContext => {
    const config = loadConfig();
    const { data } = cli.opts<GlobalOptions>();
    const path = data ?? config.storage.dataPath;
    return {
      repository: new JsonProgramRepository(path, {
        logger: createLogger('[Storage]', { debug: config.app.debug }),
      }),
      config,
      asOf: resolveReferenceDate(config, asOfText) ?? today(),
      out: consolePrinter,
      width: terminalWidth(),
    };
  };

  cli
    .command('dashboard')
    .description('Render the dashboard')
    .option('--as-of <date>', 'Reference date (DD.MM.YYYY or YYYY-MM-DD)')
    .action(async (options: AsOfOptions) => {
      await runDashboardCommand(createContext(options.asOf));
    });

  cli
    .command('modules')
    .description('List all modules with semester, credits, status and grade')
    .option('--as-of <date>', 'Reference date (DD.MM.YYYY or YYYY-MM-DD)')
    .action(async (options: AsOfOptions) => {
      await runModulesCommand(createContext(options.asOf));
    });

  cli
    .command('exams')
    .description('List ungraded exam attempts')
    .option('--as-of <date>', 'Reference date (DD.MM.YYYY or YYYY-MM-DD)')
    .action(async (options: AsOfOptions) => {
      await runExamsCommand(createContext(options.asOf));
    });

  cli
    .command('grade <code> <attempt> [grade]')
    .description('Set a grade (1,0..5,0); omit the grade to clear it')
    .option('--pick <n>', 'Which module to edit when several share the code')
    .action(async (code: string, attempt: string, grade: string | undefined, options: EditCommandOptions) => {
      await runGradeCommand(createContext(undefined), code, attempt, grade, options);
    });

  cli
    .command('schedule <code> <attempt> [date]')
    .description('Set an exam date (DD.MM.YYYY or YYYY-MM-DD); omit the date to clear it')
    .option('--pick <n>', 'Which module to edit when several share the code')
    .action(async (code: string, attempt: string, date: string | undefined, options: EditCommandOptions) => {
      await runScheduleCommand(createContext(undefined), code, attempt, date, options);
    });

  cli
    .command('interactive', { isDefault: true })
    .description('Menu-driven session (default)')
    .option('--as-of <date>', 'Reference date; asked for at startup when not set')
    .action(async (options: AsOfOptions) => {
      const ctx = createContext(options.asOf);
      await runInteractiveCommand({
        repository: ctx.repository,
        io: createReadlineIO(),
        service: createDashboardService(ctx.config),
        view: createDashboardView(ctx.config, ctx.width),
        autoSave: ctx.config.storage.autoSave,
        referenceDate: resolveReferenceDate(ctx.config, options.asOf),
      });
    });

  return cli;
}

async function main(): Promise<void> {
  await createCli().parseAsync(process.argv);
}

if (require.main === module) {
  const logger = createLogger('[CLI]');
  main().catch((error: unknown) => {
    if (error instanceof CommandError) {
      console.error(red(error.message));
    } else {
      logger.error('Error', error);
    }
    process.exitCode = 1;
  });
}
