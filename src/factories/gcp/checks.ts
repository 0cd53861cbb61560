/**
 * Standard preflight and post-stage checks for an n8n environment on GKE
 */

import type { RolloutConfig } from '../../core/config/schema.js';
import { evaluateClusterHealth, systemPodsMeetThreshold } from '../../core/readiness/cluster-health.js';
import type { NodeObservation, StageName } from '../../core/types/resources.js';
import type {
  CheckContext,
  CheckOutcome,
  CheckSeverity,
  StageCheckProvider,
  ValidationCheck,
} from '../../core/types/validation.js';
import { cidrsOverlap, isValidDomain } from '../../utils/network.js';
import { clusterLocation, names } from '../naming.js';
import type { PreflightEnvironment } from './preflight-environment.js';
import type { QuotaDescription } from './schemas.js';

export const REQUIRED_APIS = [
  'container.googleapis.com',
  'compute.googleapis.com',
  'certificatemanager.googleapis.com',
  'iam.googleapis.com',
  'cloudresourcemanager.googleapis.com',
  'iamcredentials.googleapis.com',
] as const;

const TOOLS: Array<{ binary: string; remediation: string }> = [
  { binary: 'gcloud', remediation: 'Install the Google Cloud SDK: https://cloud.google.com/sdk/docs/install' },
  { binary: 'kubectl', remediation: 'gcloud components install kubectl' },
  { binary: 'gke-gcloud-auth-plugin', remediation: 'gcloud components install gke-gcloud-auth-plugin' },
];

/** A regional cluster places its node pool in three zones */
const REGIONAL_ZONE_COUNT = 3;

/** Regional quota metric charged for each disk type */
const DISK_QUOTA_METRIC: Record<RolloutConfig['cluster']['diskType'], string> = {
  'pd-standard': 'DISKS_TOTAL_GB',
  'pd-balanced': 'SSD_TOTAL_GB',
  'pd-ssd': 'SSD_TOTAL_GB',
};

/** Cluster statuses an apply must not build on */
const BROKEN_CLUSTER_STATUSES = ['ERROR', 'DEGRADED', 'STOPPING'];

type ObserveNode = (id: string) => Promise<NodeObservation>;

const ok = (message?: string): CheckOutcome => (message ? { ok: true, message } : { ok: true });

/**
 * Quota a node count needs, as `METRIC needs N, M available` for each
 * metric the region reports and cannot cover
 */
export function quotaShortfalls(
  config: RolloutConfig,
  quotas: readonly QuotaDescription[],
  nodes: number,
  cpusPerNode: number | undefined
): string[] {
  const demand: Array<[string, number]> = [
    ['INSTANCES', nodes],
    [DISK_QUOTA_METRIC[config.cluster.diskType], nodes * config.cluster.diskSizeGb],
  ];
  if (cpusPerNode !== undefined) {
    demand.unshift(['CPUS', nodes * cpusPerNode]);
  }

  const shortfalls: string[] = [];
  for (const [metric, needed] of demand) {
    const quota = quotas.find((candidate) => candidate.metric === metric);
    if (!quota) {
      continue;
    }
    const available = quota.limit - quota.usage;
    if (available < needed) {
      shortfalls.push(`${metric} needs ${needed}, ${available} available`);
    }
  }
  return shortfalls;
}

function fail(reason: string, remediation?: string, severity?: CheckSeverity): CheckOutcome {
  return {
    ok: false,
    reason,
    ...(remediation ? { remediation } : {}),
    ...(severity ? { severity } : {}),
  };
}

export class GkeCheckProvider implements StageCheckProvider {
  constructor(private readonly env: PreflightEnvironment) {}

  checksFor(context: CheckContext): ValidationCheck[] {
    const access = this.accessChecks(context.registry.config);
    if (context.mode === 'destroy') {
      return access;
    }

    if (context.phase === 'pre-stage') {
      return context.stage === 'infra'
        ? [...access, ...this.infraPreChecks(context)]
        : [...access, ...this.appPreChecks(context)];
    }

    return context.stage === 'infra' ? this.infraPostChecks(context) : this.appPostChecks(context);
  }

  private accessChecks(config: RolloutConfig): ValidationCheck[] {
    const tools = TOOLS.map(
      ({ binary, remediation }): ValidationCheck => ({
        name: `tool:${binary}`,
        description: `${binary} resolves on PATH`,
        run: async () => {
          const path = await this.env.resolveBinary(binary);
          return path ? ok(path) : fail(`${binary} was not found on PATH`, remediation);
        },
      })
    );

    return [
      ...tools,
      {
        name: 'auth',
        description: 'An authenticated gcloud account is active',
        run: async () => {
          const account = await this.env.activeAccount();
          return account
            ? ok(`Authenticated as ${account}`)
            : fail('No active gcloud authentication found', 'gcloud auth login');
        },
      },
      {
        name: 'project',
        description: 'The target project is reachable',
        run: async () => {
          const project = await this.env.describeProject();
          if (!project) {
            return fail(
              `Project '${config.projectId}' is not accessible`,
              `Check the project id or run: gcloud config set project ${config.projectId}`
            );
          }
          if (project.lifecycleState && project.lifecycleState !== 'ACTIVE') {
            return fail(`Project '${config.projectId}' is ${project.lifecycleState}`);
          }
          return ok();
        },
      },
    ];
  }

  private infraPreChecks({ registry, mode, logger }: CheckContext): ValidationCheck[] {
    const { config } = registry;

    return [
      {
        name: 'required-apis',
        description: 'Required Google APIs are enabled',
        run: async () => {
          const missing = await this.missingApis();
          if (missing.length === 0) {
            return ok();
          }
          if (mode !== 'apply') {
            return fail(`APIs not enabled yet (apply enables them): ${missing.join(', ')}`, undefined, 'warning');
          }

          logger.info('Enabling missing APIs', { apis: missing });
          await this.env.enableApis(missing);
          const stillMissing = await this.missingApis();
          return stillMissing.length === 0
            ? ok(`Enabled ${missing.join(', ')}`)
            : fail(
                `APIs still not enabled: ${stillMissing.join(', ')}`,
                `gcloud services enable ${stillMissing.join(' ')} --project=${config.projectId}`
              );
        },
      },
      {
        name: 'machine-type',
        description: 'The node machine type is offered in the target zone',
        run: async () =>
          (await this.env.machineTypeAvailable(config.cluster.machineType, config.zone))
            ? ok()
            : fail(
                `Machine type ${config.cluster.machineType} is not available in ${config.zone}`,
                `gcloud compute machine-types list --filter="zone:${config.zone}" --project=${config.projectId}`
              ),
      },
      {
        name: 'quota',
        description: 'Regional Compute Engine quota covers the node pool',
        run: async () => {
          if (await this.env.describeCluster()) {
            return ok('Cluster exists; its nodes already hold quota');
          }
          const { cluster } = config;
          const zones = config.topology === 'regional' ? REGIONAL_ZONE_COUNT : 1;
          const [quotas, cpus] = await Promise.all([
            this.env.regionQuotas(),
            this.env.machineTypeCpus(cluster.machineType, config.zone),
          ]);
          const remediation = `Request a quota increase: https://console.cloud.google.com/iam-admin/quotas?project=${config.projectId}`;

          const initial = cluster.initialNodeCount * zones;
          const initialShortfalls = quotaShortfalls(config, quotas, initial, cpus);
          if (initialShortfalls.length > 0) {
            return fail(
              `Quota in ${config.region} cannot start the node pool (${initial} x ${cluster.machineType}): ${initialShortfalls.join('; ')}`,
              remediation
            );
          }

          const peak = cluster.maxNodes * zones;
          const peakShortfalls = quotaShortfalls(config, quotas, peak, cpus);
          if (peakShortfalls.length > 0) {
            return fail(
              `Quota in ${config.region} cannot hold the autoscaling maximum of ${peak} nodes: ${peakShortfalls.join('; ')}`,
              remediation,
              'warning'
            );
          }
          return ok(`Quota holds up to ${peak} ${cluster.machineType} nodes`);
        },
      },
      {
        name: 'subnetwork-cidr',
        description: 'The subnetwork is not bound to another CIDR or network',
        run: async () => {
          const { subnetCidr, podsCidr, servicesCidr } = config.network;
          const ranges: Array<[string, string]> = [
            ['subnet', subnetCidr],
            ['pods', podsCidr],
            ['services', servicesCidr],
          ];
          for (const [i, [nameA, cidrA]] of ranges.entries()) {
            for (const [nameB, cidrB] of ranges.slice(i + 1)) {
              if (cidrsOverlap(cidrA, cidrB)) {
                return fail(`The ${nameA} range ${cidrA} overlaps the ${nameB} range ${cidrB}`);
              }
            }
          }

          const subnetName = names.subnet(config);
          const subnet = await this.env.describeSubnetwork(subnetName);
          if (!subnet) {
            return ok('Subnetwork will be created');
          }
          const networkName = names.network(config);
          if (!subnet.network.endsWith(`/networks/${networkName}`)) {
            return fail(
              `Subnetwork ${subnetName} belongs to ${subnet.network.split('/').pop() ?? subnet.network}, not ${networkName}`,
              `gcloud compute networks subnets delete ${subnetName} --region=${config.region} --project=${config.projectId}`
            );
          }
          if (subnet.ipCidrRange !== subnetCidr) {
            return fail(
              `Subnetwork ${subnetName} uses ${subnet.ipCidrRange}, configuration expects ${subnetCidr}`,
              `Set network.subnetCidr to ${subnet.ipCidrRange} or delete the subnetwork`
            );
          }
          return ok();
        },
      },
      {
        name: 'existing-cluster',
        description: 'An existing cluster is not in a broken state',
        run: async () => {
          const cluster = await this.env.describeCluster();
          if (!cluster || !BROKEN_CLUSTER_STATUSES.includes(cluster.status)) {
            return ok();
          }
          const { flag, value } = clusterLocation(config);
          return fail(
            `Cluster ${config.clusterName} is ${cluster.status}${cluster.statusMessage ? `: ${cluster.statusMessage}` : ''}`,
            `gcloud container clusters describe ${config.clusterName} ${flag}=${value} --project=${config.projectId}`
          );
        },
      },
    ];
  }

  private appPreChecks({ registry, logger }: CheckContext): ValidationCheck[] {
    const { config } = registry;

    return [
      {
        name: 'infra-ready',
        description: 'Every infra node is ready',
        run: async () => {
          const unready = await this.unreadyNodes(nodeIds('infra'), (id) => registry.observe(id, logger));
          return unready.length === 0
            ? ok()
            : fail(
                `Infra nodes not ready: ${unready.join(', ')}`,
                `gke-rollout deploy ${config.environment} apply-infra`
              );
        },
      },
      this.clusterHealthCheck('pre-stage'),
      {
        name: 'domain',
        description: 'The domain name is valid',
        run: () =>
          isValidDomain(config.app.domain)
            ? ok()
            : fail(`'${config.app.domain}' is not a valid domain name`, 'Set app.domain to a fully qualified domain'),
      },
      {
        name: 'static-ip',
        description: 'An existing static IP is an external global address',
        run: async () => {
          const name = names.staticIp(config);
          const address = await this.env.describeGlobalAddress(name);
          if (!address) {
            return ok('Static IP will be reserved');
          }
          if (address.addressType && address.addressType !== 'EXTERNAL') {
            return fail(
              `Address ${name} is ${address.addressType}, an EXTERNAL global address is required`,
              `gcloud compute addresses delete ${name} --global --project=${config.projectId}`
            );
          }
          return ok(address.address ? `Using ${address.address}` : undefined);
        },
      },
      {
        name: 'certificate',
        description: 'An existing certificate is managed and covers the domain',
        run: async () => {
          const name = names.certificate(config);
          const certificate = await this.env.describeSslCertificate(name);
          if (!certificate) {
            return ok('Certificate will be created');
          }
          if (certificate.type !== 'MANAGED') {
            return fail(
              `Certificate ${name} is ${certificate.type ?? 'not managed'}, a MANAGED certificate is required`,
              `gcloud compute ssl-certificates delete ${name} --global --project=${config.projectId}`
            );
          }
          const domains = certificate.managed?.domains ?? [];
          if (!domains.includes(config.app.domain)) {
            return fail(
              `Certificate ${name} covers ${domains.join(', ') || 'no domains'}, not ${config.app.domain}`,
              `gcloud compute ssl-certificates delete ${name} --global --project=${config.projectId}`
            );
          }
          return ok();
        },
      },
    ];

    function nodeIds(stage: StageName): string[] {
      return registry.definitions(stage).map((node) => node.id);
    }
  }

  private infraPostChecks({ registry, logger }: CheckContext): ValidationCheck[] {
    return [
      this.nodesReadyCheck('infra-nodes-ready', registry.definitions('infra').map((n) => n.id), (id) =>
        registry.observe(id, logger)
      ),
      this.clusterHealthCheck('post-stage'),
    ];
  }

  private appPostChecks({ registry, logger }: CheckContext): ValidationCheck[] {
    const { config } = registry;
    const observe = (id: string) => registry.observe(id, logger);
    return [
      this.clusterHealthCheck('post-stage'),
      this.nodesReadyCheck('workloads-ready', ['database', 'workload'], observe),
      this.nodesReadyCheck('services-ready', ['database-service', 'service'], observe),
      this.nodesReadyCheck('ingress-address', ['ingress'], observe),
      {
        name: 'certificate-status',
        description: 'The managed certificate is ACTIVE',
        severity: 'warning',
        run: async () => {
          const observation = await observe('certificate');
          if (!observation.exists) {
            return fail('Certificate does not exist');
          }
          const { readiness } = observation;
          return readiness.ready
            ? ok(readiness.message)
            : fail(readiness.message ?? readiness.reason ?? 'not ACTIVE', undefined, readiness.severity ?? 'warning');
        },
      },
      {
        name: 'endpoint',
        description: 'The n8n endpoint answers over HTTPS',
        severity: 'warning',
        run: async () => {
          const certificate = await observe('certificate');
          if (!certificate.exists || !certificate.readiness.ready) {
            return ok('Skipped until the certificate is ACTIVE');
          }
          const url = `https://${config.app.domain}/`;
          const response = await this.env.requestEndpoint(url);
          if ('error' in response) {
            return fail(
              `${url} is not reachable: ${response.error}`,
              `Check that ${config.app.domain} resolves to the static IP ${names.staticIp(config)}`
            );
          }
          return response.status < 500
            ? ok(`${url} answered ${response.status}`)
            : fail(`${url} answered ${response.status}`);
        },
      },
    ];
  }

  /**
   * Pre-stage any unhealthy state fails; post-stage only the system-pod
   * shortfall does
   */
  private clusterHealthCheck(phase: 'pre-stage' | 'post-stage'): ValidationCheck {
    return {
      name: 'cluster-health',
      description: 'Cluster, node pool, nodes and kube-system pods are healthy',
      run: async () => {
        const snapshot = await this.env.clusterHealth();
        const health = evaluateClusterHealth(snapshot);
        if (health.ready) {
          return ok(health.message);
        }
        const reason = health.reason ?? 'Cluster is not healthy';
        if (phase === 'pre-stage') {
          return fail(reason, undefined, 'error');
        }
        const podShortfall =
          snapshot.nodes.total > 0 &&
          snapshot.nodes.ready === snapshot.nodes.total &&
          !systemPodsMeetThreshold(snapshot.systemPods.running, snapshot.systemPods.total);
        return fail(reason, undefined, podShortfall ? 'error' : 'warning');
      },
    };
  }

  private nodesReadyCheck(
    name: string,
    ids: string[],
    observe: ObserveNode
  ): ValidationCheck {
    return {
      name,
      description: `${ids.join(', ')} converged`,
      severity: 'warning',
      run: async () => {
        const unready = await this.unreadyNodes(ids, observe);
        return unready.length === 0 ? ok() : fail(`Not ready: ${unready.join(', ')}`);
      },
    };
  }

  private async unreadyNodes(
    ids: string[],
    observe: ObserveNode
  ): Promise<string[]> {
    const unready: string[] = [];
    for (const id of ids) {
      const observation = await observe(id);
      if (!observation.exists) {
        unready.push(`${id} (absent)`);
      } else if (!observation.readiness.ready) {
        unready.push(`${id} (${observation.readiness.reason ?? 'not ready'})`);
      }
    }
    return unready;
  }

  private async missingApis(): Promise<string[]> {
    const enabled = new Set(await this.env.listEnabledApis());
    return REQUIRED_APIS.filter((api) => !enabled.has(api));
  }
}
