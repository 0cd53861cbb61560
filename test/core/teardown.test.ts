import { beforeEach, describe, expect, it } from 'vitest';
import { PolicyConfirmationGate } from '../../src/core/deployment/confirmation.js';
import { destroyStages, TeardownGuard } from '../../src/core/deployment/teardown.js';
import { BlockingDependencyFailure, ProtectedResourceFailure } from '../../src/core/errors.js';
import { ResourceRegistry } from '../../src/core/registry/index.js';
import { INFRA_NODES, N8N_CATALOG } from '../../src/factories/catalog.js';
import { FakeInfrastructure, instantPoller, TEST_CATALOG, testConfig, testRun } from '../utils/fakes.js';
import type { ResourceNodeDefinition } from '../../src/core/types/resources.js';

describe('TeardownGuard', () => {
  let infra: FakeInfrastructure;

  beforeEach(() => {
    infra = new FakeInfrastructure();
  });

  function guard(
    confirmation = new PolicyConfirmationGate({ phrases: ['yes'] }),
    catalog: readonly ResourceNodeDefinition[] = TEST_CATALOG
  ): TeardownGuard {
    const registry = new ResourceRegistry(catalog, infra.handlers(catalog), testConfig());
    return new TeardownGuard(registry, {
      confirmation,
      poller: instantPoller().poller,
      readiness: { timeout: 10000 },
    });
  }

  function seedAll(): void {
    for (const id of ['net', 'cluster', 'ns', 'db', 'web', 'cert']) {
      infra.seed(id, id === 'cluster' ? { deletionProtected: true } : {});
    }
  }

  it('should destroy the app stage before the infra stage', () => {
    expect(destroyStages('all')).toEqual(['app', 'infra']);
    expect(destroyStages('infra')).toEqual(['infra']);
  });

  it('should delete dependents first and clear deletion protection once', async () => {
    seedAll();
    const run = testRun('destroy');

    const result = await guard().destroy('all', run);

    expect(result.status).toBe('success');
    expect(result.deleted).toEqual(['cert', 'web', 'db', 'ns', 'cluster', 'net']);
    expect(infra.calls).toEqual([
      'delete:cert',
      'delete:web',
      'delete:db',
      'delete:ns',
      'delete:cluster',
      'clear-protection:cluster',
      'delete:cluster',
      'delete:net',
    ]);
    expect(run.warnings).toEqual(['cluster has deletion protection enabled; it will be cleared before deletion']);
    expect(run.nodeStates.get('net')).toBe('deleted');
  });

  it('should retry a protected delete exactly once', async () => {
    infra.seed('net');
    infra.seed('cluster', { deletionProtected: true });
    infra.failures.set('delete:cluster', new Error('operation rejected'));

    const result = await guard().destroy('infra', testRun('destroy', 'infra'));

    expect(infra.calls).toEqual(['delete:cluster', 'clear-protection:cluster', 'delete:cluster']);
    const cluster = result.results.find((r) => r.id === 'cluster');
    expect(cluster?.status).toBe('failed');
    expect(cluster?.error).toBeInstanceOf(ProtectedResourceFailure);
    expect(cluster?.message).toBe(
      "Failed to delete protected resource 'cluster' after clearing its protection: operation rejected"
    );
    expect(cluster?.error?.context?.remediationCommand).toBe('fix clear-protection cluster');
  });

  it('should stop when the protection flag does not clear', async () => {
    infra.seed('net');
    infra.seed('cluster', { deletionProtected: true });
    infra.stickyProtection.add('cluster');

    const result = await guard().destroy('infra', testRun('destroy', 'infra'));

    expect(infra.calls).toEqual(['delete:cluster', 'clear-protection:cluster']);
    expect(result.results.find((r) => r.id === 'cluster')?.message).toBe(
      "Deletion protection on 'cluster' did not clear"
    );
    expect(result.results.find((r) => r.id === 'net')).toMatchObject({
      status: 'blocked',
      blockedBy: ['cluster'],
      message: "Refusing to delete 'net': dependents cluster were not deleted",
    });
    expect(result.status).toBe('failed');
    expect(infra.exists('net')).toBe(true);
  });

  it('should ask before deleting stored data and stop when declined', async () => {
    seedAll();
    const confirmation = new PolicyConfirmationGate({ phrases: [] });

    const result = await guard(confirmation).destroy('app', testRun('destroy', 'app'));

    expect(result.status).toBe('cancelled');
    expect(infra.calls).toEqual([]);
    expect(confirmation.requests).toEqual([
      {
        message: "Destroying app in 'dev' permanently deletes stored data:",
        items: ['db (dev-db)'],
        requiredPhrase: 'yes',
      },
    ]);
  });

  it('should refuse to destroy infra while app nodes are live', async () => {
    seedAll();

    const result = await guard().destroy('infra', testRun('destroy', 'infra'));

    expect(infra.calls).toEqual([]);
    expect(result.status).toBe('failed');
    expect(result.errors).toHaveLength(2);
    expect(result.errors[0]).toBeInstanceOf(BlockingDependencyFailure);
    expect(result.errors[0]?.message).toBe("Refusing to delete 'net': still required by live ns, db, web, cert");
    expect(result.results.map((r) => `${r.id}:${r.status}`)).toEqual(['net:blocked', 'cluster:blocked']);
  });

  it('should keep every n8n infra node while the app is live', async () => {
    for (const definition of N8N_CATALOG) {
      infra.seed(definition.id);
    }

    const result = await guard(undefined, N8N_CATALOG).destroy('infra', testRun('destroy', 'infra'));

    expect(infra.calls).toEqual([]);
    expect(result.status).toBe('failed');
    expect(result.results.map((r) => r.status)).toEqual(INFRA_NODES.map(() => 'blocked'));
    expect(result.results.find((r) => r.id === 'firewall-health-check')?.blockedBy).toEqual(['ingress']);
    expect(result.results.find((r) => r.id === 'firewall-ssh')?.blockedBy).toContain('workload');
  });

  it('should treat nodes on a deleted cluster as absent when they cannot be observed', async () => {
    infra.seed('net');
    for (const id of ['ns', 'db', 'web', 'cert']) {
      infra.failures.set(`observe:${id}`, new Error('cluster not found'));
    }

    const result = await guard().destroy('infra', testRun('destroy', 'infra'));

    expect(infra.calls).toEqual(['delete:net']);
    expect(result.status).toBe('success');
    expect(result.deleted).toEqual(['net']);
  });

  it('should name dependents it could not observe when refusing a delete', async () => {
    infra.seed('net');
    infra.seed('cluster');
    infra.failures.set('observe:ns', new Error('connection refused'));

    const result = await guard().destroy('infra', testRun('destroy', 'infra'));

    expect(infra.calls).toEqual([]);
    expect(result.results.map((r) => `${r.id}:${r.status}`)).toEqual(['net:blocked', 'cluster:blocked']);
    expect(result.errors[0]?.message).toBe("Refusing to delete 'net': dependents ns could not be observed");
    expect(result.errors[0]?.context?.remediation).toBe("Restore access to ns and re-run 'destroy dev infra'");
  });

  it('should treat absent nodes as already destroyed', async () => {
    infra.seed('net');
    infra.seed('cluster');

    const result = await guard().destroy('app', testRun('destroy', 'app'));

    expect(result.status).toBe('success');
    expect(result.deleted).toEqual([]);
    expect(result.results.map((r) => r.status)).toEqual(['absent', 'absent', 'absent', 'absent']);
    expect(infra.calls).toEqual([]);
  });

  it('should report a delete failure with its remediation', async () => {
    infra.seed('net');
    infra.seed('cluster');
    infra.seed('ns');
    infra.failures.set('delete:ns', new Error('namespace is terminating'));

    const result = await guard().destroy('app', testRun('destroy', 'app'));

    const ns = result.results.find((r) => r.id === 'ns');
    expect(ns?.message).toBe("Failed to delete 'ns': namespace is terminating");
    expect(ns?.error?.context?.remediation).toBe('fix delete ns');
    expect(result.status).toBe('failed');
  });
});
