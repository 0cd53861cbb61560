/**
 * Validation check types
 */

import type { RolloutLogger } from '../logging/index.js';
import type { ResourceRegistry } from '../registry/index.js';
import type { StageName } from './resources.js';

export type ValidationPhase = 'pre-stage' | 'post-stage';

export type CheckSeverity = 'error' | 'warning' | 'info';

export type CheckOutcome =
  | { ok: true; message?: string }
  | { ok: false; reason: string; remediation?: string; severity?: CheckSeverity };

/**
 * A named predicate evaluated before or after a stage
 */
export interface ValidationCheck {
  name: string;
  description?: string;
  /** Severity of a failure when the outcome does not carry one */
  severity?: CheckSeverity;
  run(): Promise<CheckOutcome> | CheckOutcome;
}

export interface CheckResult {
  check: string;
  passed: boolean;
  severity: CheckSeverity;
  message?: string;
  reason?: string;
  remediation?: string;
  durationMs: number;
}

export interface CheckFailure {
  check: string;
  reason: string;
  severity: CheckSeverity;
  remediation?: string;
}

export interface ValidationResult {
  phase: ValidationPhase;
  /** false when any error-severity check failed */
  passed: boolean;
  /** every failed check, whatever its severity */
  failures: CheckFailure[];
  /** the subset of failures that do not fail the phase */
  warnings: CheckFailure[];
  results: CheckResult[];
}

export interface StageValidation {
  stage: StageName;
  result: ValidationResult;
}

/**
 * plan: read-only, checks must not remediate
 * apply: checks may run their idempotent remediation
 * destroy: only access checks apply
 */
export type CheckMode = 'plan' | 'apply' | 'destroy';

export interface CheckContext {
  stage: StageName;
  phase: ValidationPhase;
  mode: CheckMode;
  registry: ResourceRegistry;
  logger: RolloutLogger;
}

/**
 * Supplies the checks of a stage and phase
 */
export interface StageCheckProvider {
  checksFor(context: CheckContext): ValidationCheck[];
}
