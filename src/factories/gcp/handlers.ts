/**
 * Handlers for the nodes owned by Google Cloud
 */

import type { ClusterInspector } from '../../core/kubernetes/api.js';
import { evaluateClusterHealth, TERMINAL_GKE_STATUSES } from '../../core/readiness/cluster-health.js';
import type {
  NodeContext,
  NodeObservation,
  ReadinessResult,
  ResourceHandler,
  ResourceHandlerMap,
} from '../../core/types/resources.js';
import { names, NODE_POOL_NAME } from '../naming.js';
import { collectClusterHealth } from './cluster-health.js';
import type { GcloudClient } from './gcloud.js';
import type { SslCertificateDescription } from './schemas.js';

const READY: ReadinessResult = { ready: true };

function present(readiness: ReadinessResult = READY, attributes?: Record<string, unknown>): NodeObservation {
  return { exists: true, readiness, ...(attributes ? { attributes } : {}) };
}

const ABSENT: NodeObservation = { exists: false };

export function networkHandler(gcloud: GcloudClient): ResourceHandler {
  return {
    async observe(ctx) {
      return (await gcloud.describeNetwork(ctx.name)) ? present() : ABSENT;
    },
    async create(ctx) {
      await gcloud.createNetwork(ctx.name);
    },
    async delete(ctx) {
      await gcloud.deleteNetwork(ctx.name);
    },
  };
}

export function subnetHandler(gcloud: GcloudClient): ResourceHandler {
  return {
    async observe(ctx) {
      const subnet = await gcloud.describeSubnetwork(ctx.name);
      if (!subnet) {
        return ABSENT;
      }
      return present(READY, {
        ipCidrRange: subnet.ipCidrRange,
        secondaryRanges: (subnet.secondaryIpRanges ?? []).map((range) => range.rangeName),
      });
    },
    async create(ctx) {
      await gcloud.createSubnetwork(ctx.name, names.network(ctx.config));
    },
    async delete(ctx) {
      await gcloud.deleteSubnetwork(ctx.name);
    },
  };
}

type FirewallPurpose = 'internal' | 'ssh' | 'health-check';

function firewallRule(purpose: FirewallPurpose, ctx: NodeContext) {
  const { network } = ctx.config;
  switch (purpose) {
    case 'internal':
      return {
        allow: 'tcp,udp,icmp',
        sourceRanges: [network.subnetCidr, network.podsCidr, network.servicesCidr],
        description: 'Internal traffic between nodes, pods and services',
      };
    case 'ssh':
      return {
        allow: 'tcp:22',
        sourceRanges: network.sshSourceRanges,
        description: 'SSH through Identity-Aware Proxy',
      };
    case 'health-check':
      return {
        allow: 'tcp',
        sourceRanges: network.healthCheckSourceRanges,
        description: 'Google Cloud load balancer health checks',
      };
  }
}

export function firewallHandler(gcloud: GcloudClient, purpose: FirewallPurpose): ResourceHandler {
  return {
    async observe(ctx) {
      return (await gcloud.describeFirewall(ctx.name)) ? present() : ABSENT;
    },
    async create(ctx) {
      await gcloud.createFirewall({
        name: ctx.name,
        network: names.network(ctx.config),
        ...firewallRule(purpose, ctx),
      });
    },
    async delete(ctx) {
      await gcloud.deleteFirewall(ctx.name);
    },
  };
}

/**
 * Router with its Cloud NAT. A router found without the NAT is terminal on
 * its own; `update` adds the NAT, so re-applying repairs it.
 */
export function routerHandler(gcloud: GcloudClient): ResourceHandler {
  return {
    async observe(ctx) {
      const router = await gcloud.describeRouter(ctx.name);
      if (!router) {
        return ABSENT;
      }
      const nat = names.nat(ctx.config);
      if (!(router.nats ?? []).some((candidate) => candidate.name === nat)) {
        return present({
          ready: false,
          terminal: true,
          severity: 'error',
          reason: `Cloud NAT '${nat}' is missing from router '${ctx.name}'`,
        });
      }
      return present();
    },
    async create(ctx) {
      await gcloud.createRouter(ctx.name, names.network(ctx.config));
      await gcloud.createNat(names.nat(ctx.config), ctx.name);
    },
    async update(ctx) {
      const router = await gcloud.describeRouter(ctx.name);
      const nat = names.nat(ctx.config);
      if (router && !(router.nats ?? []).some((candidate) => candidate.name === nat)) {
        ctx.logger.info('Adding the missing Cloud NAT', { nat });
        await gcloud.createNat(nat, ctx.name);
      }
    },
    async delete(ctx) {
      await gcloud.deleteRouter(ctx.name);
    },
    remediation(ctx) {
      return gcloud.commandLine([
        'compute',
        'routers',
        'nats',
        'create',
        names.nat(ctx.config),
        `--router=${ctx.name}`,
        `--region=${ctx.config.region}`,
        '--auto-allocate-nat-external-ips',
        '--nat-all-subnet-ip-ranges',
      ]);
    },
  };
}

export function clusterHandler(gcloud: GcloudClient): ResourceHandler {
  return {
    async observe() {
      const cluster = await gcloud.describeCluster();
      if (!cluster) {
        return ABSENT;
      }
      const terminal = TERMINAL_GKE_STATUSES.includes(cluster.status);
      const readiness: ReadinessResult =
        cluster.status === 'RUNNING'
          ? READY
          : {
              ready: false,
              terminal,
              severity: terminal ? 'error' : 'info',
              reason: `Cluster status is ${cluster.status}${
                cluster.statusMessage ? `: ${cluster.statusMessage}` : ''
              }`,
            };
      return {
        exists: true,
        readiness,
        deletionProtected: cluster.deletionProtection === true,
        attributes: { status: cluster.status },
      };
    },
    async create(ctx) {
      await gcloud.createCluster(names.network(ctx.config), names.subnet(ctx.config));
    },
    async delete() {
      await gcloud.deleteCluster();
    },
    async clearDeletionProtection() {
      await gcloud.clearClusterDeletionProtection();
    },
    remediation(_ctx, action) {
      return action === 'clear-protection'
        ? gcloud.clusterCommandLine('update', '--no-deletion-protection')
        : gcloud.clusterCommandLine(action === 'delete' ? 'delete' : 'describe');
    },
  };
}

/**
 * The node pool converges when the whole cluster is healthy. The default pool
 * is removed before the pool is created; a removal that a stopped run left
 * behind is finished by `update`.
 */
export function nodePoolHandler(gcloud: GcloudClient, inspector: ClusterInspector): ResourceHandler {
  return {
    async observe() {
      const pool = await gcloud.describeNodePool(NODE_POOL_NAME);
      if (!pool) {
        return ABSENT;
      }
      const snapshot = await collectClusterHealth(gcloud, inspector);
      return present(evaluateClusterHealth(snapshot), { status: pool.status });
    },
    async create(ctx) {
      await gcloud.removeDefaultNodePool();
      await gcloud.createNodePool(ctx.name);
    },
    async update() {
      await gcloud.removeDefaultNodePool({ async: true });
    },
    async delete(ctx) {
      await gcloud.deleteNodePool(ctx.name);
    },
  };
}

export function staticIpHandler(gcloud: GcloudClient): ResourceHandler {
  return {
    async observe(ctx) {
      const address = await gcloud.describeGlobalAddress(ctx.name);
      if (!address) {
        return ABSENT;
      }
      const attributes = { address: address.address, status: address.status };
      if (!address.address) {
        return present({ ready: false, reason: 'No address allocated yet' }, attributes);
      }
      return present({ ready: true, message: `Reserved ${address.address}` }, attributes);
    },
    async create(ctx) {
      await gcloud.createGlobalAddress(ctx.name);
    },
    async delete(ctx) {
      await gcloud.deleteGlobalAddress(ctx.name);
    },
  };
}

/**
 * PROVISIONING is informational, ACTIVE is ready, any other status is a
 * warning carried verbatim
 */
export function certificateReadiness(certificate: SslCertificateDescription): ReadinessResult {
  const status = certificate.managed?.status ?? 'UNKNOWN';
  const details = { status, domainStatus: certificate.managed?.domainStatus ?? {} };

  if (status === 'ACTIVE') {
    return { ready: true, message: 'Certificate ACTIVE', details };
  }
  if (status === 'PROVISIONING') {
    return {
      ready: false,
      severity: 'info',
      reason: 'PROVISIONING',
      message: 'Certificate is provisioning; this takes up to 60 minutes after DNS points at the static IP',
      details,
    };
  }
  const domains = Object.entries(certificate.managed?.domainStatus ?? {})
    .map(([domain, domainStatus]) => `${domain}=${domainStatus}`)
    .join(', ');
  return {
    ready: false,
    severity: 'warning',
    reason: domains ? `${status} (${domains})` : status,
    details,
  };
}

export function certificateHandler(gcloud: GcloudClient): ResourceHandler {
  return {
    async observe(ctx) {
      const certificate = await gcloud.describeSslCertificate(ctx.name);
      return certificate
        ? present(certificateReadiness(certificate), { status: certificate.managed?.status })
        : ABSENT;
    },
    async create(ctx) {
      await gcloud.createSslCertificate(ctx.name, ctx.config.app.domain);
    },
    async delete(ctx) {
      await gcloud.deleteSslCertificate(ctx.name);
    },
  };
}

export function createGcpHandlers(gcloud: GcloudClient, inspector: ClusterInspector): ResourceHandlerMap {
  return {
    network: networkHandler(gcloud),
    subnet: subnetHandler(gcloud),
    'firewall-internal': firewallHandler(gcloud, 'internal'),
    'firewall-ssh': firewallHandler(gcloud, 'ssh'),
    'firewall-health-check': firewallHandler(gcloud, 'health-check'),
    router: routerHandler(gcloud),
    cluster: clusterHandler(gcloud),
    'node-pool': nodePoolHandler(gcloud, inspector),
    'static-ip': staticIpHandler(gcloud),
    certificate: certificateHandler(gcloud),
  };
}
