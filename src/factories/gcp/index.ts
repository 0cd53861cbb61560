export { GkeCheckProvider, REQUIRED_APIS } from './checks.js';
export { collectClusterHealth } from './cluster-health.js';
export {
  type CommandOptions,
  type CommandResult,
  type CommandRunner,
  commandFailure,
  ExecFileCommandRunner,
  type ExecFileFn,
} from './command-runner.js';
export { DEFAULT_COMMAND_TIMEOUT_MS, type FirewallSpec, GcloudClient, type GcloudClientOptions } from './gcloud.js';
export {
  certificateHandler,
  certificateReadiness,
  clusterHandler,
  createGcpHandlers,
  firewallHandler,
  networkHandler,
  nodePoolHandler,
  routerHandler,
  staticIpHandler,
  subnetHandler,
} from './handlers.js';
export { type EndpointResponse, GcloudPreflightEnvironment, type PreflightEnvironment } from './preflight-environment.js';
