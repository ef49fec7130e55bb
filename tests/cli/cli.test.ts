/**
 * CLI Wiring Tests
 *
 * Parses real command lines with the commander program against a data
 * file in a temporary directory: where the data path and the reference
 * date come from, and how a bad `--as-of` is reported.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { createCli } from '../../src/cli';
import { CommandError } from '../../src/cli/commands/context';
import { renderOpenExams } from '../../src/cli/views/list-views';
import type { Logger } from '../../src/logger';
import { JsonProgramRepository } from '../../src/storage';
import { buildProgram, day } from '../helpers';

const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

describe('createCli', () => {
  let dir: string;
  let dataPath: string;
  let printed: string[];

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'study-dashboard-cli-'));
    dataPath = join(dir, 'program.json');
    const program = buildProgram({
      semesters: [{ modules: [{ code: 'M1', title: 'Networks', attempts: [{ date: '2024-02-20' }] }] }],
    });
    await new JsonProgramRepository(dataPath, { logger: silentLogger }).save(program);

    for (const name of [
      'DEBUG',
      'STUDY_DATA_PATH',
      'STUDY_AUTO_SAVE',
      'STUDY_REFERENCE_DATE',
      'STUDY_CRITICAL_HORIZON_DAYS',
      'STUDY_DISPLAY_CRITICAL_LIMIT',
    ]) {
      vi.stubEnv(name, '');
    }

    printed = [];
    vi.spyOn(console, 'log').mockImplementation((line: string) => {
      printed.push(line);
    });
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
    await rm(dir, { recursive: true, force: true });
  });

  async function expectedExams(asOf: string): Promise<string[]> {
    const program = await new JsonProgramRepository(dataPath, { logger: silentLogger }).load();
    return renderOpenExams(program, day(asOf));
  }

  async function run(args: string[]): Promise<void> {
    await createCli().parseAsync(args, { from: 'user' });
  }

  it('reads the data file named by STUDY_DATA_PATH', async () => {
    vi.stubEnv('STUDY_DATA_PATH', dataPath);

    await run(['exams', '--as-of', '2024-03-01']);

    expect(printed).toEqual(await expectedExams('2024-03-01'));
  });

  it('lets --data override STUDY_DATA_PATH', async () => {
    vi.stubEnv('STUDY_DATA_PATH', join(dir, 'missing.json'));

    await run(['--data', dataPath, 'exams', '--as-of', '2024-03-01']);

    expect(printed).toEqual(await expectedExams('2024-03-01'));
  });

  it('takes the reference date from STUDY_REFERENCE_DATE without --as-of', async () => {
    vi.stubEnv('STUDY_REFERENCE_DATE', '2024-01-01');

    await run(['--data', dataPath, 'exams']);

    expect(printed).toEqual(await expectedExams('2024-01-01'));
  });

  it('prefers --as-of over STUDY_REFERENCE_DATE', async () => {
    vi.stubEnv('STUDY_REFERENCE_DATE', '2024-01-01');

    await run(['--data', dataPath, 'exams', '--as-of', '01.03.2024']);

    const expected = await expectedExams('2024-03-01');
    // The exam on 20.02.2024 is overdue on 01.03.2024 but not on 01.01.2024.
    expect(expected).not.toEqual(await expectedExams('2024-01-01'));
    expect(printed).toEqual(expected);
  });

  it('rejects an empty --as-of', async () => {
    const failure = run(['--data', dataPath, 'dashboard', '--as-of', '']);

    await expect(failure).rejects.toBeInstanceOf(CommandError);
    await expect(failure).rejects.toThrow('--as-of must not be empty.');
    expect(printed).toEqual([]);
  });
});
