import type { DeployAction } from '../../core/types/deployment.js';
import { type CommonOptions, confirmationGate, createOrchestrator, finish } from './shared.js';

export interface DeployOptions extends CommonOptions {
  yes?: boolean;
  concurrency?: number;
}

export async function deployCommand(
  environment: string,
  action: DeployAction,
  options: DeployOptions
): Promise<void> {
  const orchestrator = createOrchestrator(environment, {
    ...options,
    confirmation: confirmationGate(options),
  });
  finish(await orchestrator.deploy(action));
}
