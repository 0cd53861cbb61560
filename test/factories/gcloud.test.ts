import { beforeEach, describe, expect, it } from 'vitest';
import { CommandExecutionError } from '../../src/core/errors.js';
import type { ClusterInspector, NodeSummary, PodSummary } from '../../src/core/kubernetes/api.js';
import { createLogger } from '../../src/core/logging/index.js';
import type { NodeContext } from '../../src/core/types/resources.js';
import { N8N_CATALOG } from '../../src/factories/catalog.js';
import { collectClusterHealth } from '../../src/factories/gcp/cluster-health.js';
import { commandFailure, ExecFileCommandRunner, type ExecFileFn } from '../../src/factories/gcp/command-runner.js';
import { DEFAULT_COMMAND_TIMEOUT_MS, GcloudClient } from '../../src/factories/gcp/gcloud.js';
import {
  certificateReadiness,
  clusterHandler,
  nodePoolHandler,
  routerHandler,
} from '../../src/factories/gcp/handlers.js';
import { FakeCommandRunner, testConfig } from '../utils/fakes.js';

const silent = createLogger({ level: 'silent' });

function contextFor(id: string, config = testConfig()): NodeContext {
  const node = N8N_CATALOG.find((candidate) => candidate.id === id);
  if (!node) {
    throw new Error(`no catalog node ${id}`);
  }
  return { node, name: node.name(config), config, logger: silent };
}

class FakeInspector implements ClusterInspector {
  constructor(
    private readonly nodes: NodeSummary[],
    private readonly pods: PodSummary[]
  ) {}

  async listNodes(): Promise<NodeSummary[]> {
    return this.nodes;
  }

  async listSystemPods(): Promise<PodSummary[]> {
    return this.pods;
  }
}

describe('GcloudClient', () => {
  let runner: FakeCommandRunner;
  let gcloud: GcloudClient;

  beforeEach(() => {
    runner = new FakeCommandRunner();
    gcloud = new GcloudClient(runner, testConfig());
  });

  it('should read JSON scoped to the project and location', async () => {
    runner.respondJson(['container', 'clusters', 'describe'], { name: 'dev-n8n-cluster', status: 'RUNNING' });

    expect(await gcloud.describeCluster()).toEqual({ name: 'dev-n8n-cluster', status: 'RUNNING' });
    expect(runner.invocations).toEqual([
      [
        'gcloud',
        'container',
        'clusters',
        'describe',
        'dev-n8n-cluster',
        '--zone=us-central1-a',
        '--format=json',
        '--project=n8n-dev-project',
      ],
    ]);
  });

  it('should return undefined for a resource that does not exist', async () => {
    runner.respond(['compute', 'networks', 'describe'], {
      exitCode: 1,
      stderr: "ERROR: (gcloud.compute.networks.describe) The resource 'dev-n8n-cluster-n8n-vpc' was not found",
    });

    expect(await gcloud.describeNetwork('dev-n8n-cluster-n8n-vpc')).toBeUndefined();
  });

  it('should raise other read failures with the last stderr lines', async () => {
    runner.respond(['compute', 'routers', 'describe'], { exitCode: 1, stderr: 'ERROR: permission denied\n' });

    const attempt = gcloud.describeRouter('router');

    await expect(attempt).rejects.toThrow(CommandExecutionError);
    await expect(attempt).rejects.toThrow('gcloud compute routers describe failed: ERROR: permission denied');
  });

  it('should reject output that is not JSON', async () => {
    runner.respond(['compute', 'addresses', 'describe'], { stdout: 'not json' });

    await expect(gcloud.describeGlobalAddress('ip')).rejects.toThrow(
      'gcloud compute addresses describe returned output that is not JSON'
    );
  });

  it('should reject output of the wrong shape', async () => {
    runner.respondJson(['container', 'clusters', 'describe'], { name: 'dev-n8n-cluster' });

    await expect(gcloud.describeCluster()).rejects.toThrow('Unexpected gcloud cluster output');
  });

  it('should list enabled APIs by their short name', async () => {
    runner.respondJson(['services', 'list'], [
      { name: 'projects/1/services/container.googleapis.com', config: { name: 'container.googleapis.com' } },
      { name: 'projects/1/services/compute.googleapis.com' },
    ]);

    expect(await gcloud.listEnabledApis()).toEqual(['container.googleapis.com', 'compute.googleapis.com']);
  });

  it('should treat an existing resource as created and a missing one as deleted', async () => {
    runner
      .respond(['compute', 'networks', 'create'], { exitCode: 1, stderr: 'ERROR: resource already exists' })
      .respond(['compute', 'networks', 'delete'], { exitCode: 1, stderr: 'ERROR: NOT_FOUND' });

    await gcloud.createNetwork('vpc');
    await gcloud.deleteNetwork('vpc');

    expect(runner.invocations).toEqual([
      ['gcloud', 'compute', 'networks', 'create', 'vpc', '--subnet-mode=custom', '--quiet', '--project=n8n-dev-project'],
      ['gcloud', 'compute', 'networks', 'delete', 'vpc', '--quiet', '--project=n8n-dev-project'],
    ]);
  });

  it('should create a regional protected cluster in production', async () => {
    const prod = new GcloudClient(runner, testConfig('prod'));
    await prod.createCluster('prod-n8n-cluster-n8n-vpc', 'prod-n8n-cluster-n8n-subnet');

    const args = runner.invocations[0] ?? [];
    expect(args.slice(0, 6)).toEqual([
      'gcloud',
      'container',
      'clusters',
      'create',
      'prod-n8n-cluster',
      '--region=us-central1',
    ]);
    expect(args).toContain('--deletion-protection');
    expect(args).toContain('--workload-pool=n8n-prod-project.svc.id.goog');
    expect(args).toContain('--async');
  });

  it('should remove the default pool only when it exists', async () => {
    runner.respondJson(['container', 'node-pools', 'list'], [
      { name: 'default-pool', status: 'RUNNING' },
      { name: 'n8n-node-pool', status: 'RUNNING' },
    ]);

    expect(await gcloud.removeDefaultNodePool({ async: true })).toBe(true);

    expect(runner.invocations[1]).toEqual([
      'gcloud',
      'container',
      'node-pools',
      'delete',
      'default-pool',
      '--cluster=dev-n8n-cluster',
      '--zone=us-central1-a',
      '--async',
      '--quiet',
      '--project=n8n-dev-project',
    ]);
  });

  it('should leave the default pool alone while another pool is changing', async () => {
    runner.respondJson(['container', 'node-pools', 'list'], [
      { name: 'default-pool', status: 'RUNNING' },
      { name: 'n8n-node-pool', status: 'PROVISIONING' },
    ]);

    expect(await gcloud.removeDefaultNodePool()).toBe(false);
    expect(runner.invocations).toHaveLength(1);
  });

  it('should create the node pool without waiting for it', async () => {
    await gcloud.createNodePool('n8n-node-pool');

    const args = runner.invocations[0] ?? [];
    expect(args.slice(0, 5)).toEqual(['gcloud', 'container', 'node-pools', 'create', 'n8n-node-pool']);
    expect(args).toContain('--async');
  });

  it('should bound every call with the default timeout', async () => {
    await gcloud.describeCluster();

    expect(runner.options).toEqual([{ timeoutMs: DEFAULT_COMMAND_TIMEOUT_MS }]);
    expect(DEFAULT_COMMAND_TIMEOUT_MS).toBe(600000);
  });

  it('should pass the configured timeout and abort signal to the runner', async () => {
    const controller = new AbortController();
    const bounded = new GcloudClient(runner, testConfig(), { commandTimeoutMs: 5000, signal: controller.signal });

    await bounded.deleteNetwork('vpc');

    expect(runner.options).toEqual([{ timeoutMs: 5000, signal: controller.signal }]);
  });

  it('should describe a failure without stderr by its exit code', () => {
    const error = commandFailure('gcloud', ['services', 'enable', 'x'], { stdout: '', stderr: '', exitCode: 2 });
    expect(error.message).toBe('gcloud services enable x failed: exit code 2');
    expect(error.exitCode).toBe(2);
  });
});

describe('Google Cloud handlers', () => {
  let runner: FakeCommandRunner;
  let gcloud: GcloudClient;

  beforeEach(() => {
    runner = new FakeCommandRunner();
    gcloud = new GcloudClient(runner, testConfig());
  });

  it('should report a router without its NAT as a terminal failure', async () => {
    runner.respondJson(['compute', 'routers', 'describe'], { name: 'dev-n8n-cluster-n8n-vpc-router', nats: [] });

    expect(await routerHandler(gcloud).observe(contextFor('router'))).toEqual({
      exists: true,
      readiness: {
        ready: false,
        terminal: true,
        severity: 'error',
        reason: "Cloud NAT 'dev-n8n-cluster-n8n-vpc-nat' is missing from router 'dev-n8n-cluster-n8n-vpc-router'",
      },
    });
  });

  it('should create the router and then its NAT', async () => {
    await routerHandler(gcloud).create(contextFor('router'));

    expect(runner.invocations.map((args) => args.slice(1, 5))).toEqual([
      ['compute', 'routers', 'create', 'dev-n8n-cluster-n8n-vpc-router'],
      ['compute', 'routers', 'nats', 'create'],
    ]);
  });

  it('should add a missing NAT to an existing router', async () => {
    runner.respondJson(['compute', 'routers', 'describe'], { name: 'dev-n8n-cluster-n8n-vpc-router', nats: [] });

    await routerHandler(gcloud).update?.(contextFor('router'));

    expect(runner.invocations.map((args) => args.slice(1, 6))).toEqual([
      ['compute', 'routers', 'describe', 'dev-n8n-cluster-n8n-vpc-router', '--region=us-central1'],
      ['compute', 'routers', 'nats', 'create', 'dev-n8n-cluster-n8n-vpc-nat'],
    ]);
  });

  it('should only describe a router that already has its NAT', async () => {
    runner.respondJson(['compute', 'routers', 'describe'], {
      name: 'dev-n8n-cluster-n8n-vpc-router',
      nats: [{ name: 'dev-n8n-cluster-n8n-vpc-nat' }],
    });

    await routerHandler(gcloud).update?.(contextFor('router'));

    expect(runner.invocations.map((args) => args[3])).toEqual(['describe']);
  });

  it('should remove the default pool before creating the node pool', async () => {
    runner.respondJson(['container', 'node-pools', 'list'], [{ name: 'default-pool', status: 'RUNNING' }]);

    await nodePoolHandler(gcloud, new FakeInspector([], [])).create(contextFor('node-pool'));

    expect(runner.invocations.map((args) => args.slice(3, 5))).toEqual([
      ['list', '--cluster=dev-n8n-cluster'],
      ['delete', 'default-pool'],
      ['create', 'n8n-node-pool'],
    ]);
    expect(runner.invocations[1]).not.toContain('--async');
    expect(runner.invocations[2]).toContain('--async');
  });

  it('should finish removing the default pool when the node pool already exists', async () => {
    runner.respondJson(['container', 'node-pools', 'list'], [
      { name: 'default-pool', status: 'RUNNING' },
      { name: 'n8n-node-pool', status: 'RUNNING' },
    ]);

    await nodePoolHandler(gcloud, new FakeInspector([], [])).update?.(contextFor('node-pool'));

    expect(runner.invocations.map((args) => args[3])).toEqual(['list', 'delete']);
    expect(runner.invocations[1]).toContain('--async');
  });

  it('should observe a failed cluster with its protection flag', async () => {
    runner.respondJson(['container', 'clusters', 'describe'], {
      name: 'dev-n8n-cluster',
      status: 'ERROR',
      statusMessage: 'quota exceeded',
      deletionProtection: true,
    });

    expect(await clusterHandler(gcloud).observe(contextFor('cluster'))).toEqual({
      exists: true,
      readiness: { ready: false, terminal: true, severity: 'error', reason: 'Cluster status is ERROR: quota exceeded' },
      deletionProtected: true,
      attributes: { status: 'ERROR' },
    });
  });

  it('should give the command that clears cluster protection', () => {
    expect(clusterHandler(gcloud).remediation?.(contextFor('cluster'), 'clear-protection')).toBe(
      'gcloud container clusters update dev-n8n-cluster --zone=us-central1-a --no-deletion-protection --project=n8n-dev-project'
    );
  });

  it('should hold the node pool to whole-cluster health', async () => {
    runner
      .respondJson(['container', 'clusters', 'describe'], { name: 'dev-n8n-cluster', status: 'RUNNING' })
      .respondJson(['container', 'node-pools', 'describe'], { name: 'n8n-node-pool', status: 'RUNNING' });
    const inspector = new FakeInspector(
      [{ name: 'node-1', ready: true }],
      [
        { name: 'kube-dns', phase: 'Running' },
        { name: 'metrics-server', phase: 'Running' },
      ]
    );

    const observation = await nodePoolHandler(gcloud, inspector).observe(contextFor('node-pool'));

    expect(observation).toMatchObject({
      exists: true,
      readiness: { ready: true, message: 'Cluster healthy: 1/1 nodes Ready, 2/2 kube-system pods Running' },
      attributes: { status: 'RUNNING' },
    });
  });

  it('should count only Running system pods and name the stragglers', async () => {
    runner
      .respondJson(['container', 'clusters', 'describe'], { name: 'dev-n8n-cluster', status: 'RUNNING' })
      .respondJson(['container', 'node-pools', 'describe'], { name: 'n8n-node-pool', status: 'RUNNING' });
    const inspector = new FakeInspector(
      [
        { name: 'node-1', ready: true },
        { name: 'node-2', ready: false },
      ],
      [
        { name: 'kube-dns', phase: 'Running' },
        { name: 'setup-job', phase: 'Succeeded' },
        { name: 'konnectivity', phase: 'Pending' },
      ]
    );

    expect(await collectClusterHealth(gcloud, inspector)).toEqual({
      clusterStatus: 'RUNNING',
      nodePoolStatus: 'RUNNING',
      nodes: { total: 2, ready: 1, notReady: ['node-2'] },
      systemPods: { total: 3, running: 1, notRunning: ['konnectivity'] },
    });
  });

  it('should skip Kubernetes while the cluster is provisioning', async () => {
    runner
      .respondJson(['container', 'clusters', 'describe'], { name: 'dev-n8n-cluster', status: 'PROVISIONING' })
      .respondJson(['container', 'node-pools', 'describe'], { name: 'n8n-node-pool', status: 'PROVISIONING' });

    expect(await collectClusterHealth(gcloud, new FakeInspector([], []))).toEqual({
      clusterStatus: 'PROVISIONING',
      nodePoolStatus: 'PROVISIONING',
      nodes: { total: 0, ready: 0 },
      systemPods: { total: 0, running: 0 },
    });
  });
});

describe('certificateReadiness', () => {
  it('should map managed certificate statuses', () => {
    expect(certificateReadiness({ name: 'cert', managed: { status: 'ACTIVE' } })).toMatchObject({
      ready: true,
      message: 'Certificate ACTIVE',
    });
    expect(certificateReadiness({ name: 'cert', managed: { status: 'PROVISIONING' } })).toMatchObject({
      ready: false,
      severity: 'info',
      reason: 'PROVISIONING',
    });
    expect(
      certificateReadiness({
        name: 'cert',
        managed: { status: 'FAILED_NOT_VISIBLE', domainStatus: { 'n8n-dev.example.com': 'FAILED_NOT_VISIBLE' } },
      })
    ).toMatchObject({
      ready: false,
      severity: 'warning',
      reason: 'FAILED_NOT_VISIBLE (n8n-dev.example.com=FAILED_NOT_VISIBLE)',
    });
    expect(certificateReadiness({ name: 'cert' })).toMatchObject({ reason: 'UNKNOWN' });
  });
});

describe('ExecFileCommandRunner', () => {
  function failingExec(error: unknown): ExecFileFn {
    return async () => {
      throw error;
    };
  }

  it('should forward the timeout and abort signal to the process', async () => {
    const seen: Array<{ timeout?: number; signal?: AbortSignal }> = [];
    const controller = new AbortController();
    const runner = new ExecFileCommandRunner(async (_file, _args, options) => {
      seen.push({ timeout: options.timeout, signal: options.signal });
      return { stdout: '{}', stderr: '' };
    });

    const result = await runner.run('gcloud', ['info'], { timeoutMs: 50, signal: controller.signal });

    expect(result).toEqual({ stdout: '{}', stderr: '', exitCode: 0 });
    expect(seen).toEqual([{ timeout: 50, signal: controller.signal }]);
  });

  it('should report a program killed by its timeout', async () => {
    const runner = new ExecFileCommandRunner(
      failingExec(Object.assign(new Error('Command failed'), { killed: true, code: null, signal: 'SIGTERM' }))
    );

    const attempt = runner.run('gcloud', ['container', 'node-pools', 'create', 'n8n-node-pool'], { timeoutMs: 50 });

    await expect(attempt).rejects.toBeInstanceOf(CommandExecutionError);
    await expect(attempt).rejects.toThrow('gcloud container node-pools create timed out after 50ms');
  });

  it('should report a cancelled program', async () => {
    const runner = new ExecFileCommandRunner(
      failingExec(Object.assign(new Error('The operation was aborted'), { name: 'AbortError', code: 'ABORT_ERR' }))
    );

    await expect(runner.run('gcloud', ['compute', 'networks', 'create', 'vpc'])).rejects.toThrow(
      'gcloud compute networks create was cancelled'
    );
  });

  it('should return a non-zero exit as a result', async () => {
    const runner = new ExecFileCommandRunner(
      failingExec(Object.assign(new Error('Command failed'), { code: 1, stdout: '', stderr: 'ERROR: denied' }))
    );

    expect(await runner.run('gcloud', ['info'])).toEqual({ stdout: '', stderr: 'ERROR: denied', exitCode: 1 });
  });

  it('should name a program that is not installed', async () => {
    const runner = new ExecFileCommandRunner(
      failingExec(Object.assign(new Error('spawn kubectl ENOENT'), { code: 'ENOENT' }))
    );

    await expect(runner.run('kubectl', ['version'])).rejects.toThrow("'kubectl' was not found on PATH");
  });
});
