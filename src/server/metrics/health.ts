import type { RelayMetrics } from '../types.js';
import { Counters } from './counters.js';

export function buildRelayHealthSummary(metrics: RelayMetrics, counters: Counters) {
  return {
    metrics,
    wsCloseByCode: counters.wsCloseTotal,
    messagesReceivedTotal: counters.messagesReceivedTotal,
    binaryFramesTotal: counters.binaryFramesTotal,
    protocolErrorTotal: counters.protocolErrorTotal,
    handlerErrorTotal: counters.handlerErrorTotal,
    throttleInterruptTotal: counters.throttleInterruptTotal,
    sendFailureTotal: counters.sendFailureTotal,
    heartbeatTotal: counters.heartbeatTotal,
    clientConflictTotal: counters.clientConflictTotal
  };
}
