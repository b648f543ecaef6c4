/**
 * @readycheck/shared - Version (SSOT from VERSION file)
 *
 * Reads the VERSION file at the monorepo root.
 */

import { readFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';

let cached: string | null = null;

export function getVersion(): string {
  if (cached) return cached;

  const candidates = [
    join(__dirname, '..', '..', '..', '..', 'VERSION'),
    join(process.cwd(), 'VERSION'),
  ];

  for (const p of candidates) {
    if (existsSync(p)) {
      cached = readFileSync(p, 'utf-8').trim();
      return cached;
    }
  }

  return '0.0.0';
}
