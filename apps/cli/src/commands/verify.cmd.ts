/**
 * @readycheck/cli - Verify Command
 *
 * Polls one container until it is running and its health endpoint
 * answers 2xx, within the attempt budget.
 *
 * Exit codes: 0 ready, 1 not ready (diagnostics on stderr), 2 cancelled.
 */

import { Command } from 'commander';
import type { ExitCode } from '@readycheck/shared';
import { parseAttemptBudget, parseProbeTarget, parseTargetSpec } from '@readycheck/shared';
import { ReadinessVerifier } from '@readycheck/readiness';
import { loadConfig, resolveSettings, type CommonFlags } from '../lib/config.js';
import {
  createCancellation,
  exitCodeFor,
  startSpinner,
  type CommandContext,
} from '../lib/context.js';
import { formatResult } from '../lib/formatter.js';
import { addCommonOptions, parsePort } from '../lib/options.js';

export interface VerifyFlags extends CommonFlags {
  name: string;
  containerPort?: number;
}

// ============================================================================
// Command Factory
// ============================================================================

export function createVerifyCommand(ctx: CommandContext): Command {
  const verifyCmd = new Command('verify')
    .description('Wait until a container is running and its health endpoint answers 2xx')
    .argument('<target>', 'host:port[/path]; path defaults to /health')
    .requiredOption('-n, --name <container>', 'Container name, for liveness and diagnostics')
    .option('--container-port <port>', 'Port inside the container (default: target port)', parsePort);

  addCommonOptions(verifyCmd).action(async (target: string, flags: VerifyFlags) => {
    process.exitCode = await runVerify(target, flags, ctx);
  });

  return verifyCmd;
}

// ============================================================================
// Verify
// ============================================================================

export async function runVerify(spec: string, flags: VerifyFlags, ctx: CommandContext): Promise<ExitCode> {
  const settings = resolveSettings(await loadConfig(flags.config), ctx.env, flags);
  const target = parseProbeTarget({
    ...parseTargetSpec(spec),
    name: flags.name,
    containerPort: flags.containerPort,
  });
  const budget = parseAttemptBudget(settings.budget);

  const logger = ctx.createLogger(settings);
  const handle = ctx.openRuntime(settings.ssh);
  const cancellation = createCancellation(settings.deadlineMs);
  const spinner = startSpinner(ctx, `Waiting for ${target.name} (${budget.maxAttempts} attempts)`, flags.json);

  try {
    const verifier = new ReadinessVerifier({
      runtime: handle.runtime,
      logger,
      probe: ctx.probe,
      sleep: ctx.sleep,
      logTailLines: settings.logTailLines,
    });

    const result = await verifier.verify(target, budget, { signal: cancellation.signal });
    spinner?.stop();

    if (flags.json) {
      ctx.stdout(JSON.stringify(result, null, 2));
    } else if (result.status === 'success') {
      ctx.stdout(formatResult(result));
    } else {
      ctx.stderr(formatResult(result));
    }

    return exitCodeFor(result.status);
  } finally {
    spinner?.stop();
    cancellation.dispose();
    handle.close();
  }
}
