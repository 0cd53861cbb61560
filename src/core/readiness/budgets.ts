/**
 * Per-kind readiness budgets
 */

import type { RolloutConfig } from '../config/schema.js';
import type { ReadinessConfig } from '../types/deployment.js';
import type { ResourceKind } from '../types/resources.js';

const SECOND = 1000;
const MINUTE = 60 * SECOND;

export const DEFAULT_READINESS_TIMEOUTS: Record<ResourceKind, number> = {
  network: 5 * MINUTE,
  subnetwork: 5 * MINUTE,
  'firewall-rule': 2 * MINUTE,
  router: 5 * MINUTE,
  cluster: 20 * MINUTE,
  'node-pool': 15 * MINUTE,
  'global-address': 2 * MINUTE,
  'managed-certificate': 30 * MINUTE,
  namespace: 2 * MINUTE,
  secret: 2 * MINUTE,
  'persistent-volume-claim': 5 * MINUTE,
  'stateful-set': 5 * MINUTE,
  deployment: 5 * MINUTE,
  service: 2 * MINUTE,
  ingress: 10 * MINUTE,
};

const ERROR_RETRY_DELAY = 2 * SECOND;
const PROGRESS_INTERVAL = 5; // Emit progress every 5 attempts

/**
 * Readiness configuration for one kind: configured timeout override, then
 * the kind's default, with caller overrides applied last
 */
export function readinessConfigFor(
  kind: ResourceKind,
  config: RolloutConfig,
  overrides: Partial<ReadinessConfig> = {}
): ReadinessConfig {
  return {
    timeout: config.readiness.timeouts[kind] ?? DEFAULT_READINESS_TIMEOUTS[kind],
    initialDelay: config.readiness.initialDelayMs,
    maxDelay: config.readiness.maxDelayMs,
    backoffMultiplier: config.readiness.backoffMultiplier,
    errorRetryDelay: Math.min(ERROR_RETRY_DELAY, config.readiness.maxDelayMs),
    progressInterval: PROGRESS_INTERVAL,
    ...overrides,
  };
}
