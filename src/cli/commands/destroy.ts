import type { StageTarget } from '../../core/types/resources.js';
import { type CommonOptions, confirmationGate, createOrchestrator, finish } from './shared.js';

export interface DestroyOptions extends CommonOptions {
  confirm?: string[];
}

export async function destroyCommand(
  environment: string,
  target: StageTarget,
  options: DestroyOptions
): Promise<void> {
  const orchestrator = createOrchestrator(environment, {
    ...options,
    confirmation: confirmationGate(options),
  });
  finish(await orchestrator.destroy(target));
}
