import { Counters } from '../metrics/counters.js';
import { ClientDirectory } from '../relay/client-directory.js';
import type { RelayMetrics, ServerState } from '../types.js';

export interface RelayContext {
  port: () => number | undefined;
  state: () => ServerState;
  directory: ClientDirectory;
  counters: Counters;
  getMetrics: () => RelayMetrics;
}
