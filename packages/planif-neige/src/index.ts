export {
  HttpPlanifNeigeAdapter,
  ConsolePlanifNeigeAdapter,
  entriesOf,
  parsePlanification,
} from './planif-neige-client.js';
export type { PlanifNeigeAdapter, HttpPlanifNeigeAdapterConfig } from './planif-neige-client.js';
export { StatusPoller, DEFAULT_POLL_INTERVAL_MS } from './status-poller.js';
export type { StatusPollerConfig, PollerUpdateCallback } from './status-poller.js';
