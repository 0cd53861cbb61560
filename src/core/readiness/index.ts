export { DEFAULT_READINESS_TIMEOUTS, readinessConfigFor } from './budgets.js';
export {
  type ClusterHealthSnapshot,
  evaluateClusterHealth,
  SYSTEM_POD_THRESHOLD_PERCENT,
  systemPodsMeetThreshold,
  TERMINAL_GKE_STATUSES,
} from './cluster-health.js';
export {
  type PollOptions,
  type PollOutcome,
  type PollStatus,
  ReadinessPoller,
  type Sleep,
  sleep,
} from './poller.js';
