/**
 * @readycheck/cli - Commander Program Definition
 *
 * readycheck: readiness verification for deployed containers
 *
 * 2 commands:
 * 1. verify - one container, one health endpoint
 * 2. fleet  - every service of a deployment manifest, concurrently
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { getVersion } from '@readycheck/shared';
import { createVerifyCommand } from './commands/verify.cmd.js';
import { createFleetCommand } from './commands/fleet.cmd.js';
import { defaultContext, type CommandContext } from './lib/context.js';

export { runVerify, type VerifyFlags } from './commands/verify.cmd.js';
export { runFleet, type FleetFlags } from './commands/fleet.cmd.js';
export type { CommandContext } from './lib/context.js';

// ============================================================================
// Program Factory
// ============================================================================

export function createCLI(ctx: CommandContext = defaultContext()): Command {
  const program = new Command();

  program
    .name('readycheck')
    .description('Verify that freshly deployed containers are ready for traffic')
    .version(getVersion());

  program.addCommand(createVerifyCommand(ctx));
  program.addCommand(createFleetCommand(ctx));

  // ========================================================================
  // Custom Help
  // ========================================================================
  program.addHelpText('after', () => [
    '',
    chalk.yellow('Examples:'),
    chalk.gray('  readycheck verify localhost:3000/health --name auth-service'),
    chalk.gray('  readycheck verify 10.0.0.5:3001 --name user-service --ssh-host 10.0.0.5'),
    chalk.gray('  readycheck verify localhost:3002 --name chat-service -a 1        # fast fail'),
    chalk.gray('  readycheck fleet ./readycheck.json --deadline 120'),
    '',
    chalk.yellow('Exit codes:'),
    chalk.gray('  0 ready, 1 not ready, 2 cancelled, 64 usage or configuration error'),
    '',
  ].join('\n'));

  // Errors are reported by the entry point with the right exit code
  for (const cmd of [program, ...program.commands]) {
    cmd.exitOverride();
    cmd.configureOutput({
      outputError: (str, write) => write(chalk.red(`Error: ${str}`)),
    });
  }

  return program;
}
