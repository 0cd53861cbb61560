/**
 * Rollout Orchestrator
 *
 * Entry point behind the CLI commands. Owns one registry per environment and
 * drives preflight, planning, apply and teardown for each invocation through
 * an explicit DeploymentRun.
 */

import type { RolloutConfig } from './config/schema.js';
import type { ConfirmationGate } from './deployment/confirmation.js';
import { destroyPhrases } from './deployment/confirmation.js';
import { StageExecutor } from './deployment/executor.js';
import { PlanArtifactStore } from './deployment/plan-artifact.js';
import { RunLock } from './deployment/run-lock.js';
import { DeploymentRun, outcomeForStage, outcomeForTeardown, worstOutcome } from './deployment/run.js';
import { type StatusReport, StatusReporter } from './deployment/status.js';
import { formatPlan, formatTeardown, formatValidation } from './deployment/summary.js';
import { destroyStages, TeardownGuard } from './deployment/teardown.js';
import { OrchestratorError, PreflightFailure } from './errors.js';
import { getComponentLogger } from './logging/index.js';
import type { ReadinessPoller } from './readiness/poller.js';
import { ResourceRegistry } from './registry/index.js';
import type {
  DeployAction,
  DeploymentEvent,
  DeploymentPlan,
  ReadinessConfig,
  StageExecutionStatus,
} from './types/deployment.js';
import type {
  ResourceHandlerMap,
  ResourceNodeDefinition,
  StageName,
  StageTarget,
} from './types/resources.js';
import type { CheckMode, StageCheckProvider, ValidationPhase, ValidationResult } from './types/validation.js';
import { PreflightValidator } from './validation/preflight.js';

/**
 * Collaborators for one environment: the node catalog, a handler per node
 * and the checks of every stage
 */
export interface OrchestratorRuntime {
  definitions: readonly ResourceNodeDefinition[];
  handlers: ResourceHandlerMap;
  checks: StageCheckProvider;
}

export interface OrchestratorOptions {
  /** Directory for the run lock and plan artifacts */
  stateDir: string;
  confirmation: ConfirmationGate;
  concurrency?: number;
  readiness?: Partial<ReadinessConfig>;
  poller?: ReadinessPoller;
  signal?: AbortSignal;
  /** Receives the human-readable reports (default: stdout) */
  out?: (text: string) => void;
  emitEvent?: (event: DeploymentEvent) => void;
  /** Pid written to the run lock (default: this process) */
  pid?: number;
}

const DEPLOY_ACTION_STAGES: Record<DeployAction, { mode: 'plan' | 'apply'; stages: StageName[] }> = {
  'plan-infra': { mode: 'plan', stages: ['infra'] },
  'apply-infra': { mode: 'apply', stages: ['infra'] },
  'plan-app': { mode: 'plan', stages: ['app'] },
  'apply-app': { mode: 'apply', stages: ['app'] },
  plan: { mode: 'plan', stages: ['infra', 'app'] },
  apply: { mode: 'apply', stages: ['infra', 'app'] },
};

export class Orchestrator {
  private logger = getComponentLogger('orchestrator');
  readonly registry: ResourceRegistry;
  private readonly validator = new PreflightValidator();
  private readonly artifacts: PlanArtifactStore;

  constructor(
    readonly config: RolloutConfig,
    private readonly runtime: OrchestratorRuntime,
    private readonly options: OrchestratorOptions
  ) {
    this.registry = new ResourceRegistry(runtime.definitions, runtime.handlers, config);
    this.artifacts = new PlanArtifactStore(options.stateDir);
  }

  async deploy(action: DeployAction): Promise<DeploymentRun> {
    const { mode, stages } = DEPLOY_ACTION_STAGES[action];
    const run = this.createRun(mode, stages.length > 1 ? 'all' : (stages[0] ?? 'all'));

    await this.withLock(run, async () => {
      if (mode === 'plan') {
        await this.planStages(stages, run);
        return;
      }
      for (const stage of stages) {
        const succeeded = await this.applyStage(stage, run);
        if (!succeeded) {
          break;
        }
      }
    });

    return run;
  }

  async destroy(target: StageTarget = 'all'): Promise<DeploymentRun> {
    const run = this.createRun('destroy', target);
    const stages = destroyStages(target);
    const names = this.registry
      .definitions()
      .filter((node) => stages.includes(node.stage))
      .map((node) => `${node.id} (${this.registry.nameOf(node.id)})`);

    for (const phrase of destroyPhrases(run.environment)) {
      const approved = await this.options.confirmation.confirm({
        message: `This destroys the ${target} stage${target === 'all' ? 's' : ''} of '${run.environment}':`,
        items: names,
        requiredPhrase: phrase,
      });
      if (!approved) {
        run.logger.info('Destroy cancelled at confirmation');
        run.finalize('cancelled');
        return run;
      }
    }

    await this.withLock(run, async () => {
      const firstStage = stages[0] ?? 'app';
      const access = await this.validate(firstStage, 'pre-stage', 'destroy', run);
      if (!access.passed) {
        this.rejectStage(firstStage, access, run);
        return;
      }

      const guard = new TeardownGuard(this.registry, {
        confirmation: this.options.confirmation,
        ...this.pollingOptions(run),
      });
      const result = await guard.destroy(target, run);
      this.write(formatTeardown(result));
      run.setOutcome(outcomeForTeardown(result.status));
    });

    return run;
  }

  async status(target: StageTarget = 'all'): Promise<{ run: DeploymentRun; report: StatusReport }> {
    const run = this.createRun('status', target);
    const report = await new StatusReporter(this.registry, run.logger).collect(target);
    run.finalize('success');
    return { run, report };
  }

  private async planStages(stages: StageName[], run: DeploymentRun): Promise<void> {
    const executor = this.executor(run);
    let pendingEarlierStage = false;

    for (const stage of stages) {
      if (pendingEarlierStage) {
        run.warn(
          `${stage} plan assumes no ${stage} node exists because an earlier stage still has pending changes`
        );
        this.write(formatPlan(await executor.planOnly(stage, run, { assumeAbsent: true })));
        continue;
      }

      const validation = await this.validate(stage, 'pre-stage', 'plan', run);
      if (!validation.passed) {
        this.rejectStage(stage, validation, run);
        return;
      }

      const plan = await executor.planOnly(stage, run);
      this.write(formatPlan(plan));
      pendingEarlierStage = plan.actions.some(
        (action) => action.stage === stage && action.action !== 'none'
      );
    }

    run.setOutcome('success');
  }

  /**
   * Returns whether later stages may proceed
   */
  private async applyStage(stage: StageName, run: DeploymentRun): Promise<boolean> {
    const validation = await this.validate(stage, 'pre-stage', 'apply', run);
    if (!validation.passed) {
      this.rejectStage(stage, validation, run);
      return false;
    }

    const executor = this.executor(run);
    const plan = await executor.planOnly(stage, run);
    this.write(formatPlan(plan));

    if (!(await this.confirmChanges(plan, run))) {
      run.logger.info('Apply cancelled at confirmation', { stage });
      run.setOutcome('cancelled');
      return false;
    }

    const artifactPath = await this.artifacts.write(plan, run.id);
    let status: StageExecutionStatus;
    try {
      const artifactPlan = await this.artifacts.read(artifactPath);
      status = (await executor.apply(stage, run, artifactPlan)).status;
    } finally {
      await this.artifacts.dispose(artifactPath);
    }

    run.setOutcome(worstOutcome(run.outcome ?? 'success', outcomeForStage(status)));
    if (status === 'failed') {
      return false;
    }

    const post = await this.validate(stage, 'post-stage', 'apply', run);
    if (!post.passed) {
      this.rejectStage(stage, post, run);
      return false;
    }

    return status === 'success';
  }

  private async confirmChanges(plan: DeploymentPlan, run: DeploymentRun): Promise<boolean> {
    const changes = plan.actions.filter(
      (action) => action.stage === plan.stage && (action.action === 'create' || action.action === 'update')
    );
    if (changes.length === 0) {
      return true;
    }
    return this.options.confirmation.confirm({
      message: `Apply ${changes.length} changes to ${run.environment}/${plan.stage}?`,
      items: changes.map((action) => `${action.action} ${action.id} (${action.name})`),
      requiredPhrase: 'yes',
    });
  }

  private async validate(
    stage: StageName,
    phase: ValidationPhase,
    mode: CheckMode,
    run: DeploymentRun
  ): Promise<ValidationResult> {
    const checks = this.runtime.checks.checksFor({
      stage,
      phase,
      mode,
      registry: this.registry,
      logger: run.logger,
    });
    const result = await this.validator.run(phase, checks);
    run.recordValidation(stage, result);
    this.write(formatValidation(stage, result));
    return result;
  }

  private rejectStage(stage: StageName, result: ValidationResult, run: DeploymentRun): void {
    const errors = result.failures.filter((failure) => failure.severity === 'error');
    run.fail(
      new PreflightFailure(
        `${stage} ${result.phase} validation failed: ${errors.map((f) => `${f.check}: ${f.reason}`).join('; ')}`,
        stage,
        errors.map((failure) => ({
          check: failure.check,
          reason: failure.reason,
          ...(failure.remediation ? { remediation: failure.remediation } : {}),
        }))
      )
    );
    run.setOutcome(worstOutcome(run.outcome ?? 'success', 'validation-failed'));
  }

  /**
   * Hold the environment's run lock while `body` runs. Orchestrator errors
   * land in the run; anything else propagates.
   */
  private async withLock(run: DeploymentRun, body: () => Promise<void>): Promise<void> {
    const lock = new RunLock(this.options.stateDir, run.environment, this.options.pid);
    try {
      await lock.acquire();
      await body();
      if (this.options.signal?.aborted) {
        run.warn('Run interrupted; re-run the same command to resume');
        run.setOutcome(worstOutcome(run.outcome ?? 'success', 'cancelled'));
      }
    } catch (error) {
      if (!(error instanceof OrchestratorError)) {
        throw error;
      }
      run.fail(error);
      run.setOutcome(worstOutcome(run.outcome ?? 'success', 'apply-failed'));
    } finally {
      await lock.release();
      run.finalize();
    }
  }

  private createRun(action: DeploymentRun['action'], target: StageTarget): DeploymentRun {
    const run = new DeploymentRun({
      environment: this.config.environment,
      action,
      target,
      config: this.config,
    });
    this.logger.debug('Starting run', { runId: run.id, action, target });
    return run;
  }

  private executor(run: DeploymentRun): StageExecutor {
    return new StageExecutor(this.registry, {
      ...(this.options.concurrency ? { concurrency: this.options.concurrency } : {}),
      ...this.pollingOptions(run),
    });
  }

  private pollingOptions(run: DeploymentRun): {
    readiness?: Partial<ReadinessConfig>;
    poller?: ReadinessPoller;
    signal?: AbortSignal;
    emitEvent: (event: DeploymentEvent) => void;
  } {
    return {
      ...(this.options.readiness ? { readiness: this.options.readiness } : {}),
      ...(this.options.poller ? { poller: this.options.poller } : {}),
      ...(this.options.signal ? { signal: this.options.signal } : {}),
      emitEvent:
        this.options.emitEvent ??
        ((event) =>
          run.logger.info(event.message, {
            event: event.type,
            ...(event.resourceId ? { resourceId: event.resourceId } : {}),
          })),
    };
  }

  private write(text: string): void {
    if (this.options.out) {
      this.options.out(text);
    } else {
      process.stdout.write(`${text}\n`);
    }
  }
}
