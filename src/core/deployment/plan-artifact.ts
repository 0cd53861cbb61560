/**
 * Plan artifacts
 *
 * An apply run writes its plan to disk, reads it back to drive the executor
 * and removes it when the run ends.
 */

import { mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { type } from 'arktype';
import * as yaml from 'js-yaml';
import { PlanArtifactError, toError } from '../errors.js';
import { getComponentLogger } from '../logging/index.js';
import type { DeploymentPlan } from '../types/deployment.js';
import { RESOURCE_KINDS } from '../types/resources.js';

const PlannedActionSchema = type({
  id: 'string',
  stage: "'infra' | 'app'",
  kind: type.enumerated(...RESOURCE_KINDS),
  name: 'string',
  action: "'create' | 'update' | 'wait' | 'none' | 'verify'",
  dependsOn: 'string[]',
});

const DeploymentPlanSchema = type({
  environment: 'string',
  stage: "'infra' | 'app'",
  createdAt: 'string',
  actions: PlannedActionSchema.array(),
});

export class PlanArtifactStore {
  private logger = getComponentLogger('plan-artifact');

  constructor(private readonly directory: string) {}

  pathFor(plan: Pick<DeploymentPlan, 'environment' | 'stage'>, runId: string): string {
    return join(this.directory, `${plan.environment}-${plan.stage}-${runId}.plan.yaml`);
  }

  async write(plan: DeploymentPlan, runId: string): Promise<string> {
    const path = this.pathFor(plan, runId);
    await mkdir(this.directory, { recursive: true });
    await writeFile(path, yaml.dump(plan, { noRefs: true, lineWidth: 120 }), 'utf8');
    this.logger.debug('Wrote plan artifact', { path, actions: plan.actions.length });
    return path;
  }

  async read(path: string): Promise<DeploymentPlan> {
    let content: string;
    try {
      content = await readFile(path, 'utf8');
    } catch (error) {
      throw new PlanArtifactError(`Cannot read plan artifact: ${toError(error).message}`, path);
    }

    let parsed: unknown;
    try {
      parsed = yaml.load(content, { schema: yaml.JSON_SCHEMA });
    } catch (error) {
      throw new PlanArtifactError(`Plan artifact is not valid YAML: ${toError(error).message}`, path);
    }

    const plan = DeploymentPlanSchema(parsed);
    if (plan instanceof type.errors) {
      throw new PlanArtifactError(`Plan artifact is malformed:\n${plan.summary}`, path);
    }
    return plan;
  }

  async dispose(path: string): Promise<void> {
    await rm(path, { force: true });
    this.logger.debug('Removed plan artifact', { path });
  }
}
