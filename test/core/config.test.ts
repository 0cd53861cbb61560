import { describe, expect, it } from 'vitest';
import {
  DEFAULT_CONFIG_PATH,
  type EnvironmentTable,
  loadConfig,
  loadEnvironmentTable,
  mergeConfig,
  parseEnvironmentTable,
  resolveEnvironmentConfig,
} from '../../src/core/config/loader.js';
import { ConfigurationError } from '../../src/core/errors.js';

const table = loadEnvironmentTable(DEFAULT_CONFIG_PATH);

function withEnvironment(overrides: Record<string, unknown>): EnvironmentTable {
  return {
    defaults: table.defaults,
    environments: { ...table.environments, test: { projectId: 'test-project', ...overrides } },
  };
}

function problemOf(overrides: Record<string, unknown>): ConfigurationError {
  try {
    resolveEnvironmentConfig(withEnvironment(overrides), 'test', {});
  } catch (error) {
    if (error instanceof ConfigurationError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected a configuration error');
}

describe('configuration', () => {
  it('should merge an environment over the defaults', () => {
    const config = resolveEnvironmentConfig(table, 'dev', {});

    expect(config.environment).toBe('dev');
    expect(config.projectId).toBe('n8n-dev-project');
    expect(config.clusterName).toBe('dev-n8n-cluster');
    expect(config.topology).toBe('zonal');
    expect(config.zone).toBe('us-central1-a');
    expect(config.app.domain).toBe('n8n-dev.example.com');
    expect(config.app.replicas).toBe(1);
    expect(config.network.healthCheckSourceRanges).toEqual(['130.211.0.0/22', '35.191.0.0/16']);
  });

  it('should carry production overrides', () => {
    const config = resolveEnvironmentConfig(table, 'prod', {});

    expect(config.topology).toBe('regional');
    expect(config.deletionProtection).toBe(true);
    expect(config.app.replicas).toBe(2);
    expect(config.cluster.releaseChannel).toBe('STABLE');
    expect(config.app.resources.n8n.cpuLimit).toBe('1');
    expect(config.app.resources.postgres.cpuRequest).toBe('100m');
  });

  it('should apply ROLLOUT_* overrides', () => {
    const config = resolveEnvironmentConfig(table, 'dev', {
      ROLLOUT_PROJECT_ID: 'other-project',
      ROLLOUT_CLUSTER_NAME: 'blue',
      ROLLOUT_DOMAIN: 'automation.example.org',
      ROLLOUT_REGION: '',
    });

    expect(config.projectId).toBe('other-project');
    expect(config.clusterName).toBe('blue');
    expect(config.app.domain).toBe('automation.example.org');
    expect(config.region).toBe('us-central1');
  });

  it('should list the available environments for an unknown one', () => {
    expect(() => resolveEnvironmentConfig(table, 'qa', {})).toThrow(
      "Unknown environment 'qa'. Available environments: dev, staging, prod"
    );
  });

  it('should reject out-of-bounds values naming the field', () => {
    const error = problemOf({ app: { replicas: 6 } });
    expect(error.field).toBe('app.replicas');
    expect(error.message).toContain('Invalid configuration in environment table:');
  });

  it('should reject a node range where min exceeds max', () => {
    const error = problemOf({ cluster: { minNodes: 3, maxNodes: 2, initialNodeCount: 3 } });
    expect(error.field).toBe('cluster.minNodes');
    expect(error.message).toContain('cluster.minNodes: minNodes (3) must not exceed maxNodes (2)');
    expect(error.message).toContain('cluster.initialNodeCount: initialNodeCount (3) must be between 3 and 2');
  });

  it('should reject a malformed CIDR block', () => {
    const error = problemOf({ network: { subnetCidr: '10.0.0.0/33' } });
    expect(error.field).toBe('network.subnetCidr');
    expect(error.message).toContain("network.subnetCidr: '10.0.0.0/33' is not an IPv4 CIDR block");
  });

  it('should reject a readiness timeout for an unknown kind', () => {
    const error = problemOf({ readiness: { timeouts: { database: 1000 } } });
    expect(error.field).toBe('readiness.timeouts.database');
  });

  it('should reject an invalid domain', () => {
    const error = problemOf({ app: { domain: 'localhost' } });
    expect(error.message).toContain("app.domain: 'localhost' is not a valid domain name");
  });

  it('should replace arrays instead of merging them', () => {
    expect(mergeConfig({ a: { list: [1, 2], keep: true } }, { a: { list: [3] } })).toEqual({
      a: { list: [3], keep: true },
    });
  });

  it('should report YAML syntax errors', () => {
    expect(() => parseEnvironmentTable('defaults: [unclosed', 'broken.yaml')).toThrow('Failed to parse broken.yaml');
  });

  it('should require both sections of the table', () => {
    expect(() => parseEnvironmentTable('defaults: {}\n', 'partial.yaml')).toThrow(ConfigurationError);
  });

  it('should report a missing configuration file', () => {
    expect(() => loadConfig('dev', { path: '/nonexistent/environments.yaml', env: {} })).toThrow(
      'Configuration file not found: /nonexistent/environments.yaml'
    );
  });

  it('should load the default file', () => {
    expect(loadConfig('staging', { env: {} }).cluster.maxNodes).toBe(3);
  });
});
