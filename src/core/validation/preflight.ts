/**
 * Preflight Validator
 *
 * Runs every check of a phase, never stopping at the first failure, and
 * aggregates the outcome.
 */

import { getComponentLogger } from '../logging/index.js';
import type {
  CheckFailure,
  CheckOutcome,
  CheckResult,
  CheckSeverity,
  ValidationCheck,
  ValidationPhase,
  ValidationResult,
} from '../types/validation.js';

export class PreflightValidator {
  private logger = getComponentLogger('preflight-validator');

  async run(phase: ValidationPhase, checks: readonly ValidationCheck[]): Promise<ValidationResult> {
    const results: CheckResult[] = [];

    for (const check of checks) {
      const startTime = Date.now();
      let outcome: CheckOutcome;
      try {
        outcome = await check.run();
      } catch (error) {
        outcome = {
          ok: false,
          reason: `Check '${check.name}' could not complete: ${
            error instanceof Error ? error.message : String(error)
          }`,
        };
      }

      results.push(this.toResult(phase, check, outcome, Date.now() - startTime));
    }

    const failures: CheckFailure[] = results
      .filter((result) => !result.passed)
      .map((result) => ({
        check: result.check,
        reason: result.reason ?? 'failed',
        severity: result.severity,
        ...(result.remediation ? { remediation: result.remediation } : {}),
      }));
    const warnings = failures.filter((failure) => failure.severity !== 'error');
    const passed = failures.every((failure) => failure.severity !== 'error');

    this.logger.debug('Validation phase complete', {
      phase,
      checks: results.length,
      failures: failures.length,
      warnings: warnings.length,
      passed,
    });

    return { phase, passed, failures, warnings, results };
  }

  private toResult(
    phase: ValidationPhase,
    check: ValidationCheck,
    outcome: CheckOutcome,
    durationMs: number
  ): CheckResult {
    if (outcome.ok) {
      return {
        check: check.name,
        passed: true,
        severity: check.severity ?? defaultSeverity(phase),
        ...(outcome.message ? { message: outcome.message } : {}),
        durationMs,
      };
    }

    const severity = outcome.severity ?? check.severity ?? defaultSeverity(phase);
    this.logger.debug('Check failed', { check: check.name, phase, severity, reason: outcome.reason });
    return {
      check: check.name,
      passed: false,
      severity,
      reason: outcome.reason,
      ...(outcome.remediation ? { remediation: outcome.remediation } : {}),
      durationMs,
    };
  }
}

/**
 * Pre-stage failures reject the stage; post-stage failures are advisory
 */
function defaultSeverity(phase: ValidationPhase): CheckSeverity {
  return phase === 'pre-stage' ? 'error' : 'warning';
}
