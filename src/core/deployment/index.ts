/**
 * Deployment module exports
 */

export {
  type ConfirmationGate,
  type ConfirmationRequest,
  destroyPhrases,
  InteractiveConfirmationGate,
  inquirerPrompt,
  type PhrasePrompt,
  PolicyConfirmationGate,
  type PolicyConfirmationOptions,
} from './confirmation.js';
export { type ExecutorOptions, type PlanOptions, StageExecutor } from './executor.js';
export { PlanArtifactStore } from './plan-artifact.js';
export { processIsAlive, type LivenessCheck, RunLock } from './run-lock.js';
export {
  DeploymentRun,
  type DeploymentRunInit,
  outcomeForStage,
  outcomeForTeardown,
  worstOutcome,
} from './run.js';
export { type NodeStatus, type StatusReport, StatusReporter } from './status.js';
export {
  formatPlan,
  formatRunSummary,
  formatStatus,
  formatTeardown,
  formatValidation,
} from './summary.js';
export { destroyStages, TeardownGuard, type TeardownOptions } from './teardown.js';
