/**
 * In-process stand-ins for the cloud, the cluster and the gcloud CLI
 */

import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { DEFAULT_CONFIG_PATH, loadEnvironmentTable, resolveEnvironmentConfig } from '../../src/core/config/loader.js';
import type { RolloutConfig } from '../../src/core/config/schema.js';
import { DeploymentRun } from '../../src/core/deployment/run.js';
import type { Manifest, ManifestClient, ManifestHeader } from '../../src/core/kubernetes/api.js';
import type { ClusterHealthSnapshot } from '../../src/core/readiness/cluster-health.js';
import { ReadinessPoller } from '../../src/core/readiness/poller.js';
import type { RunAction } from '../../src/core/types/deployment.js';
import type {
  ResourceHandler,
  ResourceHandlerMap,
  ResourceKind,
  ResourceNodeDefinition,
  StageName,
  StageTarget,
} from '../../src/core/types/resources.js';
import type { CommandOptions, CommandResult, CommandRunner } from '../../src/factories/gcp/command-runner.js';
import { REQUIRED_APIS } from '../../src/factories/gcp/checks.js';
import type { EndpointResponse, PreflightEnvironment } from '../../src/factories/gcp/preflight-environment.js';
import type {
  ClusterDescription,
  GlobalAddressDescription,
  ProjectDescription,
  QuotaDescription,
  SslCertificateDescription,
  SubnetworkDescription,
} from '../../src/factories/gcp/schemas.js';
import { isRecord, numberField, stringField } from '../../src/utils/type-guards.js';

export function testConfig(environment = 'dev'): RolloutConfig {
  return resolveEnvironmentConfig(loadEnvironmentTable(DEFAULT_CONFIG_PATH), environment, {});
}

export function testRun(action: RunAction = 'apply', target: StageTarget = 'all', config = testConfig()): DeploymentRun {
  return new DeploymentRun({ environment: config.environment, action, target, config, id: 'run-1' });
}

/**
 * Poller on a virtual clock: waits advance the clock instead of sleeping
 */
export function instantPoller(): { poller: ReadinessPoller; waits: number[] } {
  let now = 0;
  const waits: number[] = [];
  const poller = new ReadinessPoller(
    async (ms) => {
      waits.push(ms);
      now += ms;
    },
    () => now
  );
  return { poller, waits };
}

export async function tempDir(): Promise<{ path: string; cleanup: () => Promise<void> }> {
  const path = await mkdtemp(join(tmpdir(), 'gke-rollout-test-'));
  return { path, cleanup: () => rm(path, { recursive: true, force: true }) };
}

export function node(
  id: string,
  stage: StageName,
  dependsOn: string[] = [],
  extra: Partial<ResourceNodeDefinition> = {}
): ResourceNodeDefinition {
  const kind: ResourceKind = stage === 'infra' ? 'network' : 'deployment';
  return {
    id,
    stage,
    kind,
    description: id,
    dependsOn,
    convergence: 'foundational',
    name: (config) => `${config.environment}-${id}`,
    ...extra,
  };
}

/**
 * Two infra nodes and an app stage with a state-bearing branch and a
 * best-effort leaf
 */
export const TEST_CATALOG: ResourceNodeDefinition[] = [
  node('net', 'infra'),
  node('cluster', 'infra', ['net'], { kind: 'cluster', deletionProtected: true }),
  node('ns', 'app', ['cluster'], { kind: 'namespace' }),
  node('db', 'app', ['ns'], { kind: 'stateful-set', stateBearing: true }),
  node('web', 'app', ['db']),
  node('cert', 'app', ['ns'], { kind: 'managed-certificate', convergence: 'best-effort' }),
];

export interface FakeNodeState {
  exists: boolean;
  ready: boolean;
  reason?: string;
  terminal?: boolean;
  deletionProtected?: boolean;
}

/**
 * Cloud resources held in memory, one handler per node. Mutating calls are
 * recorded in order as `<operation>:<id>`.
 */
export class FakeInfrastructure {
  readonly state = new Map<string, FakeNodeState>();
  readonly calls: string[] = [];
  /** `<operation>:<id>` keys that throw */
  readonly failures = new Map<string, Error>();
  /** Nodes that exist but never report ready after creation */
  readonly neverReady = new Set<string>();
  /** Nodes created with deletion protection */
  readonly protectOnCreate = new Set<string>();
  /** Nodes whose protection flag survives a clear call */
  readonly stickyProtection = new Set<string>();
  /** Nodes that have an update operation */
  readonly updatable = new Set<string>();

  seed(id: string, state: Partial<FakeNodeState> = {}): void {
    this.state.set(id, { exists: true, ready: true, ...state });
  }

  exists(id: string): boolean {
    return this.state.get(id)?.exists ?? false;
  }

  mutations(operation: string): string[] {
    return this.calls.filter((call) => call.startsWith(`${operation}:`)).map((call) => call.slice(operation.length + 1));
  }

  handler(id: string): ResourceHandler {
    const fail = (operation: string): void => {
      const error = this.failures.get(`${operation}:${id}`);
      if (error) {
        throw error;
      }
    };

    const handler: ResourceHandler = {
      observe: async () => {
        fail('observe');
        const current = this.state.get(id);
        if (!current?.exists) {
          return { exists: false };
        }
        return {
          exists: true,
          readiness: {
            ready: current.ready,
            ...(current.reason ? { reason: current.reason } : {}),
            ...(current.terminal ? { terminal: true } : {}),
          },
          deletionProtected: current.deletionProtected === true,
        };
      },
      create: async () => {
        this.calls.push(`create:${id}`);
        fail('create');
        this.state.set(id, {
          exists: true,
          ready: !this.neverReady.has(id),
          ...(this.neverReady.has(id) ? { reason: 'still provisioning' } : {}),
          deletionProtected: this.protectOnCreate.has(id),
        });
      },
      delete: async () => {
        this.calls.push(`delete:${id}`);
        fail('delete');
        const current = this.state.get(id);
        if (current?.deletionProtected) {
          throw new Error(`${id} has deletion protection enabled`);
        }
        this.state.delete(id);
      },
      clearDeletionProtection: async () => {
        this.calls.push(`clear-protection:${id}`);
        const current = this.state.get(id);
        if (current && !this.stickyProtection.has(id)) {
          current.deletionProtected = false;
        }
      },
      remediation: (_ctx, action) => `fix ${action} ${id}`,
    };

    if (this.updatable.has(id)) {
      handler.update = async () => {
        this.calls.push(`update:${id}`);
        fail('update');
      };
    }
    return handler;
  }

  handlers(definitions: readonly ResourceNodeDefinition[]): ResourceHandlerMap {
    return Object.fromEntries(definitions.map((definition) => [definition.id, this.handler(definition.id)]));
  }
}

/**
 * Kubernetes API held in memory. Created objects immediately carry the
 * status a healthy cluster would report.
 */
export class FakeManifestClient implements ManifestClient {
  readonly objects = new Map<string, Record<string, unknown>>();
  readonly calls: string[] = [];

  static key(header: ManifestHeader): string {
    const { name, namespace } = header.metadata;
    return `${header.kind}/${namespace ?? ''}/${name}`;
  }

  async read(header: ManifestHeader): Promise<Record<string, unknown> | undefined> {
    return this.objects.get(FakeManifestClient.key(header));
  }

  async apply(manifest: Manifest): Promise<void> {
    this.calls.push(`apply:${FakeManifestClient.key(manifest)}`);
    const existing = this.objects.get(FakeManifestClient.key(manifest));
    this.objects.set(FakeManifestClient.key(manifest), { ...withStatus(manifest), ...(existing ? { status: existing.status } : {}) });
  }

  async create(manifest: Manifest): Promise<void> {
    this.calls.push(`create:${FakeManifestClient.key(manifest)}`);
    this.objects.set(FakeManifestClient.key(manifest), withStatus(manifest));
  }

  async delete(header: ManifestHeader): Promise<boolean> {
    this.calls.push(`delete:${FakeManifestClient.key(header)}`);
    return this.objects.delete(FakeManifestClient.key(header));
  }
}

function withStatus(manifest: Manifest): Record<string, unknown> {
  const spec = isRecord(manifest.spec) ? manifest.spec : {};
  switch (manifest.kind) {
    case 'Namespace':
      return { ...manifest, status: { phase: 'Active' } };
    case 'PersistentVolumeClaim':
      return { ...manifest, status: { phase: 'Bound' } };
    case 'Deployment':
    case 'StatefulSet': {
      const replicas = numberField(spec, 'replicas') ?? 1;
      return { ...manifest, status: { readyReplicas: replicas, updatedReplicas: replicas } };
    }
    case 'Service': {
      const ports = Array.isArray(spec.ports) ? spec.ports : [];
      const nodePorts = stringField(spec, 'type') === 'NodePort';
      return {
        ...manifest,
        spec: {
          ...spec,
          clusterIP: '10.1.0.10',
          ports: ports.map((port) => (isRecord(port) && nodePorts ? { ...port, nodePort: 30080 } : port)),
        },
      };
    }
    case 'Ingress':
      return { ...manifest, status: { loadBalancer: { ingress: [{ ip: '203.0.113.10' }] } } };
    default:
      return { ...manifest };
  }
}

/**
 * gcloud stand-in: answers are matched by the leading arguments
 */
export class FakeCommandRunner implements CommandRunner {
  readonly invocations: string[][] = [];
  readonly options: CommandOptions[] = [];
  private readonly responses: Array<{ prefix: string[]; result: CommandResult }> = [];

  respond(prefix: string[], result: Partial<CommandResult>): this {
    this.responses.push({ prefix, result: { stdout: '', stderr: '', exitCode: 0, ...result } });
    return this;
  }

  respondJson(prefix: string[], value: unknown): this {
    return this.respond(prefix, { stdout: JSON.stringify(value) });
  }

  async run(command: string, args: readonly string[], options: CommandOptions = {}): Promise<CommandResult> {
    this.invocations.push([command, ...args]);
    this.options.push(options);
    const match = this.responses.find(({ prefix }) => prefix.every((arg, i) => args[i] === arg));
    return match ? match.result : { stdout: '', stderr: '', exitCode: 0 };
  }
}

/**
 * Preflight environment backed by a FakeInfrastructure: the cluster is
 * healthy once the cluster and node-pool nodes exist and are ready
 */
export class FakePreflightEnvironment implements PreflightEnvironment {
  binaries = new Set(['gcloud', 'kubectl', 'gke-gcloud-auth-plugin']);
  account: string | undefined = 'test@example.com';
  project: ProjectDescription | undefined = { projectId: 'n8n-dev-project', lifecycleState: 'ACTIVE' };
  enabledApis: string[] = [...REQUIRED_APIS];
  readonly enableCalls: string[][] = [];
  enableWorks = true;
  machineTypes = new Set(['e2-medium']);
  cpus: Record<string, number> = { 'e2-medium': 2, 'e2-standard-2': 2 };
  quotas: QuotaDescription[] = [];
  endpoint: EndpointResponse = { status: 200 };
  readonly requestedUrls: string[] = [];
  subnetwork: SubnetworkDescription | undefined;
  cluster: ClusterDescription | undefined;
  address: GlobalAddressDescription | undefined;
  certificate: SslCertificateDescription | undefined;
  health: ClusterHealthSnapshot | undefined;

  constructor(private readonly infra?: FakeInfrastructure) {}

  async resolveBinary(name: string): Promise<string | undefined> {
    return this.binaries.has(name) ? `/usr/bin/${name}` : undefined;
  }

  async activeAccount(): Promise<string | undefined> {
    return this.account;
  }

  async describeProject(): Promise<ProjectDescription | undefined> {
    return this.project;
  }

  async listEnabledApis(): Promise<string[]> {
    return [...this.enabledApis];
  }

  async enableApis(apis: readonly string[]): Promise<void> {
    this.enableCalls.push([...apis]);
    if (this.enableWorks) {
      this.enabledApis.push(...apis);
    }
  }

  async machineTypeAvailable(machineType: string): Promise<boolean> {
    return this.machineTypes.has(machineType);
  }

  async machineTypeCpus(machineType: string): Promise<number | undefined> {
    return this.cpus[machineType];
  }

  async regionQuotas(): Promise<QuotaDescription[]> {
    return this.quotas;
  }

  async requestEndpoint(url: string): Promise<EndpointResponse> {
    this.requestedUrls.push(url);
    return this.endpoint;
  }

  async describeSubnetwork(): Promise<SubnetworkDescription | undefined> {
    return this.subnetwork;
  }

  async describeCluster(): Promise<ClusterDescription | undefined> {
    return this.cluster;
  }

  async describeGlobalAddress(): Promise<GlobalAddressDescription | undefined> {
    return this.address;
  }

  async describeSslCertificate(): Promise<SslCertificateDescription | undefined> {
    return this.certificate;
  }

  async clusterHealth(): Promise<ClusterHealthSnapshot> {
    if (this.health) {
      return this.health;
    }
    const up = (id: string) => this.infra?.state.get(id)?.ready === true;
    if (!up('cluster') || !up('node-pool')) {
      return {
        clusterStatus: up('cluster') ? 'RUNNING' : undefined,
        nodePoolStatus: undefined,
        nodes: { total: 0, ready: 0 },
        systemPods: { total: 0, running: 0 },
      };
    }
    return {
      clusterStatus: 'RUNNING',
      nodePoolStatus: 'RUNNING',
      nodes: { total: 1, ready: 1 },
      systemPods: { total: 10, running: 10 },
    };
  }
}
