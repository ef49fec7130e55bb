/**
 * Read-only commands: `dashboard`, `modules` and `exams`.
 *
 * Usage (via CLI):
 * ```bash
 * study-dashboard dashboard --as-of 2024-03-01
 * study-dashboard modules
 * study-dashboard exams
 * ```
 */

import type { Config } from '../../config';
import { DashboardService } from '../../core/dashboard';
import { DashboardView } from '../views/dashboard-view';
import { renderModuleList, renderOpenExams } from '../views/list-views';
import type { CommandContext } from './context';

/**
 * Dashboard service set up from the configuration.
 */
export function createDashboardService(config: Config): DashboardService {
  return new DashboardService({ criticalHorizonDays: config.dashboard.criticalHorizonDays });
}

/**
 * Dashboard view set up from the configuration.
 */
export function createDashboardView(config: Config, width?: number): DashboardView {
  return new DashboardView({ width, criticalLimit: config.dashboard.displayCriticalLimit });
}

function printLines(ctx: CommandContext, lines: string[]): void {
  for (const line of lines) {
    ctx.out.print(line);
  }
}

export async function runDashboardCommand(ctx: CommandContext): Promise<void> {
  const program = await ctx.repository.load();
  const state = createDashboardService(ctx.config).buildState(program, ctx.asOf);
  printLines(ctx, createDashboardView(ctx.config, ctx.width).render(state));
}

export async function runModulesCommand(ctx: CommandContext): Promise<void> {
  const program = await ctx.repository.load();
  printLines(ctx, renderModuleList(program, ctx.asOf));
}

export async function runExamsCommand(ctx: CommandContext): Promise<void> {
  const program = await ctx.repository.load();
  printLines(ctx, renderOpenExams(program, ctx.asOf));
}
