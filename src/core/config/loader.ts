/**
 * Configuration loading
 *
 * Reads the environment table, merges the selected environment over the
 * defaults, applies ROLLOUT_* overrides and validates the result.
 */

import { existsSync, readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { type } from 'arktype';
import * as yaml from 'js-yaml';
import { isValidCidr, isValidDomain } from '../../utils/network.js';
import { isRecord } from '../../utils/type-guards.js';
import { ConfigurationError, formatConfigurationProblems } from '../errors.js';
import { getComponentLogger } from '../logging/index.js';
import { RESOURCE_KINDS } from '../types/resources.js';
import { EnvironmentTableSchema, type RolloutConfig, RolloutConfigSchema } from './schema.js';

const logger = getComponentLogger('config-loader');

export const DEFAULT_CONFIG_PATH = resolve(
  dirname(fileURLToPath(import.meta.url)),
  '../../../config/environments.yaml'
);

export interface EnvironmentTable {
  defaults: Record<string, unknown>;
  environments: Record<string, Record<string, unknown>>;
}

export interface LoadConfigOptions {
  /** Path to the environment table (default: ROLLOUT_CONFIG or config/environments.yaml) */
  path?: string;
  /** Variables consulted for overrides (default: process.env) */
  env?: Record<string, string | undefined>;
}

/**
 * Environment variables that override individual fields
 */
const ENV_OVERRIDES: Array<{ variable: string; path: readonly string[] }> = [
  { variable: 'ROLLOUT_PROJECT_ID', path: ['projectId'] },
  { variable: 'ROLLOUT_REGION', path: ['region'] },
  { variable: 'ROLLOUT_ZONE', path: ['zone'] },
  { variable: 'ROLLOUT_CLUSTER_NAME', path: ['clusterName'] },
  { variable: 'ROLLOUT_DOMAIN', path: ['app', 'domain'] },
];

/**
 * Deep merge where nested objects merge and everything else (arrays included) replaces
 */
export function mergeConfig(
  base: Record<string, unknown>,
  override: Record<string, unknown>
): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    const existing = merged[key];
    merged[key] = isRecord(existing) && isRecord(value) ? mergeConfig(existing, value) : value;
  }
  return merged;
}

function setPath(target: Record<string, unknown>, path: readonly string[], value: unknown): void {
  const [head, ...rest] = path;
  if (head === undefined) {
    return;
  }
  if (rest.length === 0) {
    target[head] = value;
    return;
  }
  const child = target[head];
  const next: Record<string, unknown> = isRecord(child) ? { ...child } : {};
  setPath(next, rest, value);
  target[head] = next;
}

/**
 * Parse the environment table from YAML text
 */
export function parseEnvironmentTable(text: string, source: string): EnvironmentTable {
  let raw: unknown;
  try {
    raw = yaml.load(text);
  } catch (error) {
    throw new ConfigurationError(
      `Failed to parse ${source}: ${error instanceof Error ? error.message : String(error)}`,
      undefined,
      ['Check the YAML syntax of the environment table']
    );
  }

  const result = EnvironmentTableSchema(raw);
  if (result instanceof type.errors) {
    throw formatConfigurationProblems(
      source,
      result.summary,
      result.map((problem) => problem.path.join('.'))
    );
  }

  const environments: Record<string, Record<string, unknown>> = {};
  for (const [name, value] of Object.entries(result.environments)) {
    environments[name] = isRecord(value) ? value : {};
  }
  return {
    defaults: isRecord(result.defaults) ? result.defaults : {},
    environments,
  };
}

export function loadEnvironmentTable(path: string): EnvironmentTable {
  if (!existsSync(path)) {
    throw new ConfigurationError(`Configuration file not found: ${path}`, undefined, [
      'Pass --config <path> or set ROLLOUT_CONFIG',
    ]);
  }
  return parseEnvironmentTable(readFileSync(path, 'utf8'), path);
}

/**
 * Build and validate the configuration of one environment
 */
export function resolveEnvironmentConfig(
  table: EnvironmentTable,
  environment: string,
  env: Record<string, string | undefined> = process.env,
  source = 'environment table'
): RolloutConfig {
  const overrides = table.environments[environment];
  if (!overrides) {
    const available = Object.keys(table.environments);
    throw new ConfigurationError(
      `Unknown environment '${environment}'. Available environments: ${available.join(', ')}`,
      'environment',
      available.map((name) => `Use one of: ${name}`)
    );
  }

  const merged = mergeConfig(table.defaults, overrides);
  merged.environment = environment;
  if (merged.clusterName === undefined) {
    merged.clusterName = `${environment}-n8n-cluster`;
  }

  for (const { variable, path } of ENV_OVERRIDES) {
    const value = env[variable];
    if (value !== undefined && value !== '') {
      logger.debug('Applying environment override', { variable, field: path.join('.') });
      setPath(merged, path, value);
    }
  }

  const result = RolloutConfigSchema(merged);
  if (result instanceof type.errors) {
    throw formatConfigurationProblems(
      source,
      result.summary,
      result.map((problem) => problem.path.join('.'))
    );
  }

  validateSemantics(result, source);
  return result;
}

/**
 * Cross-field rules the schema cannot express
 */
export function validateSemantics(config: RolloutConfig, source: string): void {
  const problems: Array<{ field: string; message: string }> = [];

  const cidrs: Array<[string, string]> = [
    ['network.subnetCidr', config.network.subnetCidr],
    ['network.podsCidr', config.network.podsCidr],
    ['network.servicesCidr', config.network.servicesCidr],
    ...config.network.sshSourceRanges.map((cidr, i): [string, string] => [
      `network.sshSourceRanges.${i}`,
      cidr,
    ]),
    ...config.network.healthCheckSourceRanges.map((cidr, i): [string, string] => [
      `network.healthCheckSourceRanges.${i}`,
      cidr,
    ]),
  ];
  for (const [field, cidr] of cidrs) {
    if (!isValidCidr(cidr)) {
      problems.push({ field, message: `'${cidr}' is not an IPv4 CIDR block` });
    }
  }

  if (!isValidDomain(config.app.domain)) {
    problems.push({ field: 'app.domain', message: `'${config.app.domain}' is not a valid domain name` });
  }

  const { minNodes, maxNodes, initialNodeCount } = config.cluster;
  if (minNodes > maxNodes) {
    problems.push({
      field: 'cluster.minNodes',
      message: `minNodes (${minNodes}) must not exceed maxNodes (${maxNodes})`,
    });
  }
  if (initialNodeCount < minNodes || initialNodeCount > maxNodes) {
    problems.push({
      field: 'cluster.initialNodeCount',
      message: `initialNodeCount (${initialNodeCount}) must be between ${minNodes} and ${maxNodes}`,
    });
  }

  for (const [kind, timeout] of Object.entries(config.readiness.timeouts)) {
    if (!RESOURCE_KINDS.some((known) => known === kind)) {
      problems.push({
        field: `readiness.timeouts.${kind}`,
        message: `unknown resource kind '${kind}'`,
      });
    } else if (!(timeout > 0)) {
      problems.push({
        field: `readiness.timeouts.${kind}`,
        message: `timeout must be positive, got ${timeout}`,
      });
    }
  }

  if (problems.length > 0) {
    throw formatConfigurationProblems(
      source,
      problems.map((problem) => `${problem.field}: ${problem.message}`).join('\n'),
      problems.map((problem) => problem.field)
    );
  }
}

/**
 * Load the configuration of one environment from disk
 */
export function loadConfig(environment: string, options: LoadConfigOptions = {}): RolloutConfig {
  const env = options.env ?? process.env;
  const path = options.path ?? env.ROLLOUT_CONFIG ?? DEFAULT_CONFIG_PATH;
  const config = resolveEnvironmentConfig(loadEnvironmentTable(path), environment, env, path);
  logger.debug('Loaded configuration', {
    environment,
    path,
    projectId: config.projectId,
    topology: config.topology,
  });
  return config;
}
