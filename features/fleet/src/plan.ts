/**
 * Fleet plan: manifest services -> probe targets with their budget
 */

import type { AttemptBudget, BudgetOverrides, FleetManifest, ProbeTarget } from '@readycheck/shared';
import { DEFAULT_HOST, ValidationError, parseAttemptBudget, parseProbeTarget } from '@readycheck/shared';

export interface FleetPlan {
  targets: ProbeTarget[];
  budget: AttemptBudget;
  logTailLines?: number;
}

/**
 * Budget precedence: defaults < manifest < overrides (command line).
 * A service without its own host uses the manifest host, then the SSH
 * host, then localhost.
 */
export function buildFleetPlan(manifest: FleetManifest, overrides: BudgetOverrides = {}): FleetPlan {
  const budget = parseAttemptBudget({ ...manifest.budget, ...overrides });
  const defaultHost = manifest.host ?? manifest.ssh?.host ?? DEFAULT_HOST;

  const seen = new Set<string>();
  const targets = manifest.services.map((service) => {
    if (seen.has(service.name)) {
      throw new ValidationError(`Duplicate service "${service.name}" in manifest`);
    }
    seen.add(service.name);

    return parseProbeTarget({
      name: service.name,
      host: service.host ?? defaultHost,
      port: service.port,
      path: service.path,
      containerPort: service.containerPort,
    });
  });

  return { targets, budget, logTailLines: manifest.logTailLines };
}
