/**
 * @readycheck/cli - Fleet Command
 *
 * Verifies every service listed in a manifest (default ./readycheck.json)
 * concurrently, one independent verifier per service, and prints an
 * "N/M services healthy" summary.
 */

import { Command } from 'commander';
import { resolve } from 'node:path';
import type { ExitCode } from '@readycheck/shared';
import { ReadinessVerifier } from '@readycheck/readiness';
import { FleetService, buildFleetPlan } from '@readycheck/fleet';
import {
  DEFAULT_MANIFEST,
  loadConfig,
  loadManifest,
  resolveSettings,
  type CommonFlags,
} from '../lib/config.js';
import {
  createCancellation,
  exitCodeFor,
  startSpinner,
  type CommandContext,
} from '../lib/context.js';
import { formatFleetSummary, formatResult } from '../lib/formatter.js';
import { addCommonOptions } from '../lib/options.js';

export type FleetFlags = CommonFlags;

// ============================================================================
// Command Factory
// ============================================================================

export function createFleetCommand(ctx: CommandContext): Command {
  const fleetCmd = new Command('fleet')
    .description('Verify all services of a deployment manifest concurrently')
    .argument('[manifest]', 'Manifest file', DEFAULT_MANIFEST);

  addCommonOptions(fleetCmd).action(async (manifest: string, flags: FleetFlags) => {
    process.exitCode = await runFleet(manifest, flags, ctx);
  });

  return fleetCmd;
}

// ============================================================================
// Fleet
// ============================================================================

export async function runFleet(manifestPath: string, flags: FleetFlags, ctx: CommandContext): Promise<ExitCode> {
  const manifest = await loadManifest(resolve(manifestPath));
  const settings = resolveSettings(await loadConfig(flags.config), ctx.env, flags, manifest);
  const plan = buildFleetPlan(manifest, settings.budget);
  const logTailLines = settings.logTailLines ?? plan.logTailLines;

  const logger = ctx.createLogger(settings);
  const handle = ctx.openRuntime(settings.ssh);
  const cancellation = createCancellation(settings.deadlineMs);
  const spinner = startSpinner(ctx, `Waiting for ${plan.targets.length} services`, flags.json);

  try {
    const fleet = new FleetService(
      () =>
        new ReadinessVerifier({
          runtime: handle.runtime,
          logger,
          probe: ctx.probe,
          sleep: ctx.sleep,
          logTailLines,
        }),
      logger,
    );

    const report = await fleet.verifyAll(plan.targets, plan.budget, { signal: cancellation.signal });
    spinner?.stop();

    if (flags.json) {
      ctx.stdout(JSON.stringify(report, null, 2));
      return exitCodeFor(report.status);
    }

    for (const result of report.results) {
      if (result.status === 'success') {
        ctx.stdout(formatResult(result));
      } else {
        ctx.stderr(formatResult(result));
      }
    }

    const summary = formatFleetSummary(report);
    if (report.status === 'success') {
      ctx.stdout(summary);
    } else {
      ctx.stderr(summary);
    }

    return exitCodeFor(report.status);
  } finally {
    spinner?.stop();
    cancellation.dispose();
    handle.close();
  }
}
