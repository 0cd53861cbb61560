/**
 * Plumbing shared by the CLI commands
 */

import { InvalidArgumentError } from 'commander';
import { loadConfig } from '../../core/config/loader.js';
import {
  type ConfirmationGate,
  InteractiveConfirmationGate,
  PolicyConfirmationGate,
} from '../../core/deployment/confirmation.js';
import type { DeploymentRun } from '../../core/deployment/run.js';
import { formatRunSummary } from '../../core/deployment/summary.js';
import { Orchestrator } from '../../core/orchestrator.js';
import { createRuntime } from '../../factories/index.js';

export const DEFAULT_STATE_DIR = '.rollout';

export interface CommonOptions {
  config?: string;
  stateDir: string;
}

export function parseConcurrency(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Concurrency must be a positive integer.');
  }
  return parsed;
}

/**
 * Abort controller tied to Ctrl-C. A second Ctrl-C exits immediately.
 */
export function interruptSignal(): AbortSignal {
  const controller = new AbortController();
  process.once('SIGINT', () => {
    process.stderr.write('\nInterrupted: cancelling the current step, then stopping\n');
    controller.abort();
    process.once('SIGINT', () => process.exit(130));
  });
  return controller.signal;
}

export function confirmationGate(options: { yes?: boolean; confirm?: string[] }): ConfirmationGate {
  if (options.yes) {
    return new PolicyConfirmationGate({ approveAll: true });
  }
  if (options.confirm && options.confirm.length > 0) {
    return new PolicyConfirmationGate({ phrases: options.confirm });
  }
  return new InteractiveConfirmationGate();
}

export function createOrchestrator(
  environment: string,
  options: CommonOptions & { confirmation: ConfirmationGate; concurrency?: number }
): Orchestrator {
  const config = loadConfig(environment, options.config ? { path: options.config } : {});
  const signal = interruptSignal();
  return new Orchestrator(config, createRuntime(config, { signal }), {
    stateDir: options.stateDir,
    confirmation: options.confirmation,
    signal,
    ...(options.concurrency ? { concurrency: options.concurrency } : {}),
  });
}

export function finish(run: DeploymentRun): void {
  process.stdout.write(`${formatRunSummary(run)}\n`);
  process.exitCode = run.exitCode();
}
