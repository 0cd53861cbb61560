import { describe, expect, it } from 'vitest';
import type { ValidationCheck } from '../../src/core/types/validation.js';
import { PreflightValidator } from '../../src/core/validation/preflight.js';

function check(name: string, passes: boolean, extra: Partial<ValidationCheck> = {}): ValidationCheck {
  return {
    name,
    run: () => (passes ? { ok: true } : { ok: false, reason: `${name} failed`, remediation: `fix ${name}` }),
    ...extra,
  };
}

describe('PreflightValidator', () => {
  const validator = new PreflightValidator();

  it('should run every check and report every failure', async () => {
    const result = await validator.run('pre-stage', [
      check('a', false),
      check('b', false),
      check('c', true),
      check('d', false),
    ]);

    expect(result.passed).toBe(false);
    expect(result.results).toHaveLength(4);
    expect(result.failures.map((failure) => failure.check)).toEqual(['a', 'b', 'd']);
    expect(result.failures[0]).toEqual({
      check: 'a',
      reason: 'a failed',
      severity: 'error',
      remediation: 'fix a',
    });
    expect(result.warnings).toEqual([]);
  });

  it('should turn a throwing check into a failure', async () => {
    const result = await validator.run('pre-stage', [
      {
        name: 'auth',
        run: async () => {
          throw new Error('gcloud exited with code 1');
        },
      },
      check('project', true),
    ]);

    expect(result.passed).toBe(false);
    expect(result.failures).toEqual([
      {
        check: 'auth',
        reason: "Check 'auth' could not complete: gcloud exited with code 1",
        severity: 'error',
      },
    ]);
    expect(result.results[1]?.passed).toBe(true);
  });

  it('should treat post-stage failures as warnings by default', async () => {
    const result = await validator.run('post-stage', [check('ingress-address', false)]);

    expect(result.passed).toBe(true);
    expect(result.warnings.map((warning) => warning.check)).toEqual(['ingress-address']);
    expect(result.failures[0]?.severity).toBe('warning');
  });

  it('should let the outcome severity override the check severity', async () => {
    const result = await validator.run('post-stage', [
      {
        name: 'cluster-health',
        severity: 'warning',
        run: () => ({ ok: false, reason: '7/10 (70%) kube-system pods Running', severity: 'error' }),
      },
    ]);

    expect(result.passed).toBe(false);
    expect(result.failures[0]?.severity).toBe('error');
  });

  it('should pass a pre-stage phase whose only failure is a warning', async () => {
    const result = await validator.run('pre-stage', [
      check('required-apis', false, { severity: 'warning' }),
      check('project', true),
    ]);

    expect(result.passed).toBe(true);
    expect(result.warnings).toHaveLength(1);
  });

  it('should keep the message of a passing check', async () => {
    const result = await validator.run('pre-stage', [
      { name: 'auth', run: () => ({ ok: true, message: 'Authenticated as test@example.com' }) },
    ]);

    expect(result.results[0]).toMatchObject({
      check: 'auth',
      passed: true,
      severity: 'error',
      message: 'Authenticated as test@example.com',
    });
  });
});
