/**
 * Kubernetes manifests of the n8n application and its PostgreSQL database
 */

import { randomBytes } from 'node:crypto';
import type { ContainerResources, RolloutConfig } from '../../core/config/schema.js';
import type { Manifest } from '../../core/kubernetes/api.js';
import { names, N8N_NAMESPACE } from '../naming.js';

const POSTGRES_PORT = 5432;
const N8N_PORT = 5678;
const POSTGRES_USER = 'n8n';
const POSTGRES_DB = 'n8n';

/** Produces a fresh secret value; tests substitute a fixed one */
export type SecretGenerator = () => string;

export const randomSecret: SecretGenerator = () => randomBytes(24).toString('base64url');

function labels(config: RolloutConfig, component: string): Record<string, string> {
  return {
    app: 'n8n',
    component,
    environment: config.environment,
    'app.kubernetes.io/managed-by': 'gke-rollout',
  };
}

function resources(spec: ContainerResources) {
  return {
    requests: { cpu: spec.cpuRequest, memory: spec.memoryRequest },
    limits: { cpu: spec.cpuLimit, memory: spec.memoryLimit },
  };
}

function secretRef(secret: string, key: string) {
  return { valueFrom: { secretKeyRef: { name: secret, key } } };
}

export function namespaceManifest(config: RolloutConfig): Manifest {
  return {
    apiVersion: 'v1',
    kind: 'Namespace',
    metadata: { name: N8N_NAMESPACE, labels: labels(config, 'namespace') },
  };
}

export function postgresSecretManifest(
  config: RolloutConfig,
  generate: SecretGenerator = randomSecret
): Manifest {
  return {
    apiVersion: 'v1',
    kind: 'Secret',
    metadata: {
      name: names.postgresSecret(),
      namespace: N8N_NAMESPACE,
      labels: labels(config, 'database'),
    },
    type: 'Opaque',
    stringData: {
      POSTGRES_USER,
      POSTGRES_PASSWORD: generate(),
      POSTGRES_DB,
    },
  };
}

export function n8nSecretManifest(config: RolloutConfig, generate: SecretGenerator = randomSecret): Manifest {
  return {
    apiVersion: 'v1',
    kind: 'Secret',
    metadata: {
      name: names.n8nSecret(),
      namespace: N8N_NAMESPACE,
      labels: labels(config, 'deployment'),
    },
    type: 'Opaque',
    stringData: { N8N_ENCRYPTION_KEY: generate() },
  };
}

export function storageManifest(config: RolloutConfig): Manifest {
  return {
    apiVersion: 'v1',
    kind: 'PersistentVolumeClaim',
    metadata: { name: names.storage(), namespace: N8N_NAMESPACE, labels: labels(config, 'storage') },
    spec: {
      accessModes: ['ReadWriteOnce'],
      resources: { requests: { storage: `${config.app.storageGb}Gi` } },
    },
  };
}

export function databaseManifest(config: RolloutConfig): Manifest {
  const podLabels = labels(config, 'database');
  const secret = names.postgresSecret();

  return {
    apiVersion: 'apps/v1',
    kind: 'StatefulSet',
    metadata: { name: names.database(), namespace: N8N_NAMESPACE, labels: podLabels },
    spec: {
      serviceName: names.databaseService(),
      replicas: 1,
      selector: { matchLabels: { app: 'n8n', component: 'database' } },
      template: {
        metadata: { labels: podLabels },
        spec: {
          containers: [
            {
              name: 'postgres',
              image: config.app.postgresImage,
              ports: [{ name: 'postgres', containerPort: POSTGRES_PORT }],
              env: [
                { name: 'POSTGRES_USER', ...secretRef(secret, 'POSTGRES_USER') },
                { name: 'POSTGRES_PASSWORD', ...secretRef(secret, 'POSTGRES_PASSWORD') },
                { name: 'POSTGRES_DB', ...secretRef(secret, 'POSTGRES_DB') },
                { name: 'PGDATA', value: '/var/lib/postgresql/data/pgdata' },
              ],
              resources: resources(config.app.resources.postgres),
              readinessProbe: {
                exec: { command: ['pg_isready', '-U', POSTGRES_USER, '-d', POSTGRES_DB] },
                initialDelaySeconds: 10,
                periodSeconds: 10,
              },
              volumeMounts: [{ name: 'postgres-data', mountPath: '/var/lib/postgresql/data' }],
            },
          ],
        },
      },
      volumeClaimTemplates: [
        {
          metadata: { name: 'postgres-data' },
          spec: {
            accessModes: ['ReadWriteOnce'],
            resources: { requests: { storage: `${config.app.postgresStorageGb}Gi` } },
          },
        },
      ],
    },
  };
}

export function databaseServiceManifest(config: RolloutConfig): Manifest {
  return {
    apiVersion: 'v1',
    kind: 'Service',
    metadata: {
      name: names.databaseService(),
      namespace: N8N_NAMESPACE,
      labels: labels(config, 'database'),
    },
    spec: {
      type: 'ClusterIP',
      selector: { app: 'n8n', component: 'database' },
      ports: [{ name: 'postgres', port: POSTGRES_PORT, targetPort: POSTGRES_PORT }],
    },
  };
}

export function workloadManifest(config: RolloutConfig): Manifest {
  const podLabels = labels(config, 'deployment');
  const dbSecret = names.postgresSecret();
  const { domain } = config.app;

  return {
    apiVersion: 'apps/v1',
    kind: 'Deployment',
    metadata: { name: names.workload(), namespace: N8N_NAMESPACE, labels: podLabels },
    spec: {
      replicas: config.app.replicas,
      selector: { matchLabels: { app: 'n8n', component: 'deployment' } },
      template: {
        metadata: { labels: podLabels },
        spec: {
          containers: [
            {
              name: 'n8n',
              image: config.app.n8nImage,
              ports: [{ name: 'http', containerPort: N8N_PORT }],
              env: [
                { name: 'DB_TYPE', value: 'postgresdb' },
                { name: 'DB_POSTGRESDB_HOST', value: names.databaseService() },
                { name: 'DB_POSTGRESDB_PORT', value: String(POSTGRES_PORT) },
                { name: 'DB_POSTGRESDB_DATABASE', ...secretRef(dbSecret, 'POSTGRES_DB') },
                { name: 'DB_POSTGRESDB_USER', ...secretRef(dbSecret, 'POSTGRES_USER') },
                { name: 'DB_POSTGRESDB_PASSWORD', ...secretRef(dbSecret, 'POSTGRES_PASSWORD') },
                { name: 'N8N_ENCRYPTION_KEY', ...secretRef(names.n8nSecret(), 'N8N_ENCRYPTION_KEY') },
                { name: 'N8N_HOST', value: domain },
                { name: 'N8N_PORT', value: String(N8N_PORT) },
                { name: 'N8N_PROTOCOL', value: 'https' },
                { name: 'WEBHOOK_URL', value: `https://${domain}/` },
                { name: 'GENERIC_TIMEZONE', value: config.app.timezone },
                { name: 'TZ', value: config.app.timezone },
              ],
              resources: resources(config.app.resources.n8n),
              readinessProbe: {
                httpGet: { path: '/healthz', port: N8N_PORT },
                initialDelaySeconds: 15,
                periodSeconds: 10,
              },
              volumeMounts: [{ name: 'n8n-data', mountPath: '/home/node/.n8n' }],
            },
          ],
          volumes: [{ name: 'n8n-data', persistentVolumeClaim: { claimName: names.storage() } }],
        },
      },
    },
  };
}

export function serviceManifest(config: RolloutConfig): Manifest {
  return {
    apiVersion: 'v1',
    kind: 'Service',
    metadata: { name: names.service(), namespace: N8N_NAMESPACE, labels: labels(config, 'service') },
    spec: {
      type: 'NodePort',
      selector: { app: 'n8n', component: 'deployment' },
      ports: [{ name: 'http', port: 80, targetPort: N8N_PORT }],
    },
  };
}

/**
 * GKE Ingress bound to the reserved static IP and the managed certificate,
 * with plain HTTP disabled
 */
export function ingressManifest(config: RolloutConfig): Manifest {
  return {
    apiVersion: 'networking.k8s.io/v1',
    kind: 'Ingress',
    metadata: {
      name: names.ingress(),
      namespace: N8N_NAMESPACE,
      labels: labels(config, 'ingress'),
      annotations: {
        'kubernetes.io/ingress.global-static-ip-name': names.staticIp(config),
        'ingress.gcp.kubernetes.io/pre-shared-cert': names.certificate(config),
        'kubernetes.io/ingress.allow-http': 'false',
      },
    },
    spec: {
      rules: [
        {
          host: config.app.domain,
          http: {
            paths: [
              {
                path: '/',
                pathType: 'Prefix',
                backend: { service: { name: names.service(), port: { number: 80 } } },
              },
            ],
          },
        },
      ],
    },
  };
}
