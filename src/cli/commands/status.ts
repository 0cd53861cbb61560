import { PolicyConfirmationGate } from '../../core/deployment/confirmation.js';
import { formatStatus } from '../../core/deployment/summary.js';
import type { StageTarget } from '../../core/types/resources.js';
import { type CommonOptions, createOrchestrator } from './shared.js';

export interface StatusOptions extends CommonOptions {
  infra?: boolean;
  app?: boolean;
  all?: boolean;
  json?: boolean;
}

export function statusTarget(options: Pick<StatusOptions, 'infra' | 'app' | 'all'>): StageTarget {
  if (options.all || options.infra === options.app) {
    return 'all';
  }
  return options.infra ? 'infra' : 'app';
}

export async function statusCommand(environment: string, options: StatusOptions): Promise<void> {
  // Read-only: nothing to confirm
  const orchestrator = createOrchestrator(environment, {
    ...options,
    confirmation: new PolicyConfirmationGate(),
  });
  const { report } = await orchestrator.status(statusTarget(options));

  process.stdout.write(
    options.json ? `${JSON.stringify(report, null, 2)}\n` : `${formatStatus(report)}\n`
  );
  process.exitCode = report.healthy ? 0 : 1;
}
