/**
 * @readycheck/cli - Configuration Loader
 *
 * Reads ~/.readycheck/config.json and the READYCHECK_* environment once,
 * at the command boundary. Everything below the CLI receives explicit
 * settings objects.
 */

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { homedir } from 'node:os';
import type { BudgetOverrides, CLIConfigFile, FleetManifest, LogLevel, SSHConfig } from '@readycheck/shared';
import {
  ConfigError,
  cliConfigSchema,
  errorCode,
  errorMessage,
  fleetManifestSchema,
  logLevelSchema,
  parseWith,
} from '@readycheck/shared';

// ============================================================================
// Paths
// ============================================================================

const CONFIG_DIR = join(homedir(), '.readycheck');
const CONFIG_FILE = join(CONFIG_DIR, 'config.json');
const DEFAULT_SSH_KEY = join(homedir(), '.ssh', 'id_rsa');

export const DEFAULT_MANIFEST = 'readycheck.json';

// ============================================================================
// File Loading
// ============================================================================

async function readJson(path: string, what: string): Promise<unknown | undefined> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    if (isNotFound(error)) return undefined;
    throw new ConfigError(`Cannot read ${what} ${path}: ${errorMessage(error)}`);
  }

  try {
    return JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`${what} ${path} is not valid JSON: ${errorMessage(error)}`);
  }
}

function isNotFound(error: unknown): boolean {
  return errorCode(error) === 'ENOENT';
}

/**
 * Load the CLI config file. A missing file means "all defaults";
 * a malformed one is an error.
 */
export async function loadConfig(path: string = CONFIG_FILE): Promise<CLIConfigFile> {
  const json = await readJson(path, 'config file');
  if (json === undefined) return {};
  return parseWith(cliConfigSchema, json, `config file ${path}`);
}

export async function loadManifest(path: string): Promise<FleetManifest> {
  const json = await readJson(path, 'manifest');
  if (json === undefined) {
    throw new ConfigError(`Manifest not found: ${path}`);
  }
  return parseWith(fleetManifestSchema, json, `manifest ${path}`);
}

// ============================================================================
// Settings Resolution
// ============================================================================

/** Command-line values, already converted by the option parsers */
export interface CommonFlags {
  config?: string;
  maxAttempts?: number;
  delay?: number;
  timeout?: number;
  logLines?: number;
  deadline?: number;
  sshHost?: string;
  sshUser?: string;
  sshPort?: number;
  sshKey?: string;
  json?: boolean;
  verbose?: boolean;
  logLevel?: string;
}

export interface ResolvedSettings {
  logLevel: LogLevel;
  logDir?: string;
  /** Unset: runtime queries run on this machine */
  ssh?: SSHConfig;
  budget: BudgetOverrides;
  logTailLines?: number;
  deadlineMs?: number;
}

export type Env = Record<string, string | undefined>;

/**
 * Precedence, lowest first: defaults, config file, manifest (fleet only),
 * environment, flags.
 */
export function resolveSettings(
  file: CLIConfigFile,
  env: Env,
  flags: CommonFlags,
  manifest?: Pick<FleetManifest, 'ssh' | 'budget' | 'logTailLines'>,
): ResolvedSettings {
  const logLevel = parseWith(
    logLevelSchema,
    flags.logLevel ?? (flags.verbose ? 'debug' : undefined) ?? env.READYCHECK_LOG_LEVEL ?? file.logLevel ?? 'warn',
    'log level',
  );

  const sshHost = flags.sshHost ?? manifest?.ssh?.host ?? file.ssh?.host;
  const ssh: SSHConfig | undefined = sshHost
    ? {
        host: sshHost,
        port: flags.sshPort ?? manifest?.ssh?.port ?? file.ssh?.port ?? 22,
        username: flags.sshUser ?? manifest?.ssh?.username ?? file.ssh?.username ?? 'root',
        privateKeyPath:
          flags.sshKey ??
          env.READYCHECK_SSH_KEY ??
          manifest?.ssh?.privateKeyPath ??
          file.ssh?.privateKeyPath ??
          DEFAULT_SSH_KEY,
      }
    : undefined;

  const budget: BudgetOverrides = { ...file.budget, ...manifest?.budget };
  if (flags.maxAttempts !== undefined) budget.maxAttempts = flags.maxAttempts;
  if (flags.delay !== undefined) budget.delayMs = flags.delay;
  if (flags.timeout !== undefined) budget.probeTimeoutMs = flags.timeout;

  return {
    logLevel,
    logDir: file.logDir,
    ssh,
    budget,
    logTailLines: flags.logLines ?? manifest?.logTailLines ?? file.logTailLines,
    deadlineMs: flags.deadline,
  };
}
