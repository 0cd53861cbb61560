#!/usr/bin/env node
/**
 * gke-rollout CLI
 *
 * Staged deployment, status and teardown of an n8n environment on GKE
 */

import { Argument, Command } from 'commander';
import { OrchestratorError } from '../core/errors.js';
import { DEPLOY_ACTIONS } from '../core/types/deployment.js';
import { deployCommand } from './commands/deploy.js';
import { destroyCommand } from './commands/destroy.js';
import { DEFAULT_STATE_DIR, parseConcurrency } from './commands/shared.js';
import { statusCommand } from './commands/status.js';

const program = new Command();

program
  .name('gke-rollout')
  .description('Dependency-ordered rollout and teardown of n8n on Google Kubernetes Engine')
  .version('0.1.0');

program
  .command('deploy')
  .description('Plan or apply the infra and app stages of an environment')
  .argument('<environment>', 'Environment name from the configuration file')
  .addArgument(new Argument('<stage-action>', 'What to plan or apply').choices(DEPLOY_ACTIONS))
  .option('-c, --config <path>', 'Path to the environment configuration file')
  .option('-y, --yes', 'Apply without prompting', false)
  .option('--concurrency <n>', 'Nodes applied in parallel within a dependency level', parseConcurrency)
  .option('--state-dir <dir>', 'Directory for the run lock and plan artifacts', DEFAULT_STATE_DIR)
  .action(deployCommand);

program
  .command('destroy')
  .description('Tear down an environment in reverse dependency order')
  .argument('<environment>', 'Environment name from the configuration file')
  .addArgument(new Argument('[target]', 'Stages to destroy').choices(['all', 'infra', 'app']).default('all'))
  .option('-c, --config <path>', 'Path to the environment configuration file')
  .option('--confirm <phrases...>', 'Confirmation phrases supplied non-interactively')
  .option('--state-dir <dir>', 'Directory for the run lock and plan artifacts', DEFAULT_STATE_DIR)
  .action(destroyCommand);

program
  .command('status')
  .description('Report the live state of every node (read-only)')
  .argument('<environment>', 'Environment name from the configuration file')
  .option('--infra', 'Only the infra stage')
  .option('--app', 'Only the app stage')
  .option('--all', 'Both stages (default)')
  .option('--json', 'Print the report as JSON')
  .option('-c, --config <path>', 'Path to the environment configuration file')
  .option('--state-dir <dir>', 'Directory for the run lock and plan artifacts', DEFAULT_STATE_DIR)
  .action(statusCommand);

try {
  await program.parseAsync();
} catch (error) {
  if (error instanceof OrchestratorError) {
    process.stderr.write(`Error [${error.code}]: ${error.message}\n`);
    process.exitCode = 1;
  } else {
    throw error;
  }
}
