/**
 * Error taxonomy for rollout runs
 *
 * Every failure carries a machine-readable code, the resource it concerns
 * where there is one, and a next step the operator can act on.
 */

export class OrchestratorError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'OrchestratorError';
  }
}

export class ConfigurationError extends OrchestratorError {
  constructor(
    message: string,
    public readonly field?: string,
    public readonly suggestions?: string[]
  ) {
    super(message, 'CONFIGURATION_ERROR', { field, suggestions });
    this.name = 'ConfigurationError';
  }
}

export class CircularDependencyError extends OrchestratorError {
  constructor(
    message: string,
    public readonly cycle: string[],
    public readonly suggestions?: string[]
  ) {
    super(message, 'CIRCULAR_DEPENDENCY', { cycle, suggestions });
    this.name = 'CircularDependencyError';
  }
}

/**
 * One or more validation checks rejected the requested stage before any
 * mutating call was issued.
 */
export class PreflightFailure extends OrchestratorError {
  constructor(
    message: string,
    public readonly stage: string,
    public readonly failures: Array<{ check: string; reason: string; remediation?: string }>
  ) {
    super(message, 'PREFLIGHT_FAILURE', { stage, failures });
    this.name = 'PreflightFailure';
  }
}

export class ApplyFailure extends OrchestratorError {
  constructor(
    message: string,
    public readonly resourceId: string,
    public readonly operation: 'create' | 'update' | 'delete' | 'observe',
    public override readonly cause?: Error,
    public readonly remediation?: string
  ) {
    super(message, 'APPLY_FAILURE', {
      resourceId,
      operation,
      cause: cause?.message,
      remediation,
    });
    this.name = 'ApplyFailure';
  }
}

export class ConvergenceTimeoutError extends OrchestratorError {
  constructor(
    public readonly resourceId: string,
    public readonly timeoutMs: number,
    public readonly lastReason?: string
  ) {
    super(
      `Timed out after ${timeoutMs}ms waiting for '${resourceId}' to become ready${
        lastReason ? ` (last observation: ${lastReason})` : ''
      }`,
      'CONVERGENCE_TIMEOUT',
      { resourceId, timeoutMs, lastReason }
    );
    this.name = 'ConvergenceTimeoutError';
  }
}

/**
 * A deletion-protected resource could not be removed after clearing its
 * protection flag and retrying once.
 */
export class ProtectedResourceFailure extends OrchestratorError {
  constructor(
    message: string,
    public readonly resourceId: string,
    public readonly remediationCommand: string,
    public override readonly cause?: Error
  ) {
    super(message, 'PROTECTED_RESOURCE_FAILURE', {
      resourceId,
      remediationCommand,
      cause: cause?.message,
    });
    this.name = 'ProtectedResourceFailure';
  }
}

export class BlockingDependencyFailure extends OrchestratorError {
  constructor(
    message: string,
    public readonly resourceId: string,
    public readonly blockedBy: string[],
    public readonly remediation?: string
  ) {
    super(message, 'BLOCKING_DEPENDENCY', { resourceId, blockedBy, remediation });
    this.name = 'BlockingDependencyFailure';
  }
}

export class RunLockError extends OrchestratorError {
  constructor(
    message: string,
    public readonly environment: string,
    public readonly lockPath: string,
    public readonly ownerPid?: number
  ) {
    super(message, 'RUN_LOCKED', { environment, lockPath, ownerPid });
    this.name = 'RunLockError';
  }
}

export class PlanArtifactError extends OrchestratorError {
  constructor(
    message: string,
    public readonly artifactPath: string
  ) {
    super(message, 'PLAN_ARTIFACT_ERROR', { artifactPath });
    this.name = 'PlanArtifactError';
  }
}

/**
 * An external CLI exited non-zero or produced output that could not be parsed.
 */
export class CommandExecutionError extends OrchestratorError {
  constructor(
    message: string,
    public readonly command: string,
    public readonly args: readonly string[],
    public readonly exitCode: number | null,
    public readonly stderr: string
  ) {
    super(message, 'COMMAND_FAILED', { command, args, exitCode, stderr });
    this.name = 'CommandExecutionError';
  }
}

/**
 * Normalize anything thrown into an Error instance
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Format arktype problems into a ConfigurationError pointing at the first bad field
 */
export function formatConfigurationProblems(
  source: string,
  summary: string,
  paths: string[]
): ConfigurationError {
  const field = paths[0] ?? 'root';
  const suggestions = [
    `Fix the value of '${field}' in ${source}`,
    'See config/environments.yaml for documented defaults and bounds',
  ];
  if (paths.length > 1) {
    suggestions.push(`Fix all ${paths.length} validation errors listed above`);
  }
  return new ConfigurationError(`Invalid configuration in ${source}:\n${summary}`, field, suggestions);
}

/**
 * Format circular dependency errors with helpful context
 */
export function formatCircularDependencyError(cycle: string[]): CircularDependencyError {
  const cycleStr = `${cycle.join(' -> ')} -> ${cycle[0]}`;
  return new CircularDependencyError(`Circular dependency detected: ${cycleStr}`, cycle, [
    'Remove one of the dependsOn entries to break the cycle',
    'Check that no infra node depends on an app node',
  ]);
}
