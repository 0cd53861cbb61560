/**
 * Plain-text reports written to stdout by the CLI
 */

import type { DeploymentPlan, NodeResult, TeardownResult } from '../types/deployment.js';
import type { ValidationResult } from '../types/validation.js';
import type { DeploymentRun } from './run.js';
import type { StatusReport } from './status.js';

const ACTION_LABELS: Record<string, string> = {
  create: '+ create',
  update: '~ update',
  wait: '. wait',
  none: '= ok',
  verify: '? verify',
};

export function formatPlan(plan: DeploymentPlan): string {
  const lines = [`Plan for ${plan.environment}/${plan.stage} (${plan.actions.length} nodes):`];
  for (const action of plan.actions) {
    const label = ACTION_LABELS[action.action] ?? action.action;
    lines.push(`  ${label.padEnd(9)} ${action.id} (${action.kind} ${action.name})`);
  }
  const changes = plan.actions.filter((a) => a.action === 'create' || a.action === 'update').length;
  lines.push(`  ${changes} to create or update`);
  return lines.join('\n');
}

export function formatValidation(stage: string, result: ValidationResult): string {
  const passed = result.results.filter((r) => r.passed).length;
  const lines = [
    `${stage} ${result.phase} checks: ${passed}/${result.results.length} passed${
      result.passed ? '' : ' (FAILED)'
    }`,
  ];
  for (const failure of result.failures) {
    lines.push(`  [${failure.severity}] ${failure.check}: ${failure.reason}`);
    if (failure.remediation) {
      lines.push(`      fix: ${failure.remediation}`);
    }
  }
  return lines.join('\n');
}

function formatNodeResult(result: NodeResult): string {
  const detail = result.message ? `: ${result.message}` : '';
  return `  ${result.status.padEnd(8)} ${result.id}${detail}`;
}

export function formatTeardown(result: TeardownResult): string {
  const lines = [`Teardown of ${result.target}: ${result.status}`];
  lines.push(...result.results.map(formatNodeResult));
  return lines.join('\n');
}

export function formatStatus(report: StatusReport): string {
  const lines = [`Status of ${report.environment} (${report.target}):`];
  for (const node of report.nodes) {
    const reason = node.reason ? ` (${node.reason})` : '';
    lines.push(`  ${node.state.padEnd(8)} ${node.id} ${node.name}${reason}`);
  }
  lines.push(report.healthy ? 'All nodes ready' : 'Some nodes are not ready');
  return lines.join('\n');
}

/**
 * Final summary of a run: outcome, per-node results, warnings and errors
 * with their remediation
 */
export function formatRunSummary(run: DeploymentRun): string {
  const lines = [
    `Run ${run.id} ${run.action} ${run.environment}/${run.target}: ${run.outcome ?? 'unfinished'}`,
  ];

  if (run.nodeResults.length > 0) {
    lines.push('Nodes:');
    lines.push(...run.nodeResults.map(formatNodeResult));
  }

  if (run.warnings.length > 0) {
    lines.push(`Warnings (${run.warnings.length}):`);
    lines.push(...run.warnings.map((warning) => `  - ${warning}`));
  }

  if (run.errors.length > 0) {
    lines.push(`Errors (${run.errors.length}):`);
    for (const error of run.errors) {
      lines.push(`  - [${error.code}] ${error.message}`);
      const remediation = error.context?.remediation ?? error.context?.remediationCommand;
      if (typeof remediation === 'string') {
        lines.push(`      fix: ${remediation}`);
      }
    }
  }

  return lines.join('\n');
}
