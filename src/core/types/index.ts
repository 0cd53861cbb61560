export type { DependencyNode } from './dependencies.js';
export {
  DEPLOY_ACTIONS,
  type DeployAction,
  type DeploymentEvent,
  type DeploymentPlan,
  type NodeResult,
  type NodeResultStatus,
  type PlannedAction,
  type PlannedActionType,
  type ReadinessConfig,
  type RunAction,
  type RunOutcome,
  type StageExecutionResult,
  type StageExecutionStatus,
  type TeardownResult,
  type TeardownStatus,
} from './deployment.js';
export {
  RESOURCE_KINDS,
  STAGES,
  type ConvergenceClass,
  type NodeContext,
  type NodeObservation,
  type NodeState,
  type ReadinessResult,
  type ReadinessSeverity,
  type RemediationAction,
  type ResourceHandler,
  type ResourceHandlerMap,
  type ResourceKind,
  type ResourceNodeDefinition,
  type StageName,
  type StageTarget,
} from './resources.js';
export type {
  CheckContext,
  CheckFailure,
  CheckMode,
  CheckOutcome,
  CheckResult,
  CheckSeverity,
  StageCheckProvider,
  StageValidation,
  ValidationCheck,
  ValidationPhase,
  ValidationResult,
} from './validation.js';
