import { WsAction, infoMessagePayloadSchema, registerPayloadSchema } from '../transport/ws-protocol.js';
import type { ActionHandler, HandlerMap } from './dispatcher.js';

export const handleRegister: ActionHandler = ({ connection, payload, directory, counters, logger }) => {
  const parsed = registerPayloadSchema.safeParse(payload);
  if (!parsed.success) {
    counters.protocolErrorTotal += 1;
    logger.warn('register', `invalid ${WsAction.CmdRegister} payload from ${connection.id}`, parsed.error.issues);
    return;
  }

  const { clientType, clientUid } = parsed.data;
  const holder = directory.findUidConflict(connection, clientUid);
  if (holder) {
    counters.clientConflictTotal += 1;
    logger.warn('register', `uid ${clientUid} already held by ${holder.id}; ${connection.id} takes over addressing`);
  }
  directory.register(connection, clientType, clientUid, Date.now());
  logger.info('register', `${connection.id} registered as ${clientType} (${clientUid})`);
};

export const handleInfoMessage: ActionHandler = ({ connection, payload, logger }) => {
  const parsed = infoMessagePayloadSchema.safeParse(payload);
  if (!parsed.success) {
    logger.warn('message', `invalid ${WsAction.InfoMessage} payload from ${connection.id}`, parsed.error.issues);
    return;
  }
  const { messageType, message } = parsed.data;
  const line = `${connection.id}: ${message}`;
  if (messageType === 'error') logger.error('message', line);
  else if (messageType === 'warning') logger.warn('message', line);
  else logger.info('message', line);
};

export const handleCitationCounts: ActionHandler = ({ connection, payload, logger }) => {
  logger.info('citations', `citation counts from ${connection.id}`, payload);
};

export const handleCitationCountsInterrupted: ActionHandler = ({ connection, payload, logger }) => {
  logger.warn('citations', `citation count fetch interrupted on ${connection.id}`, payload);
};

export function defaultHandlers(overrides: Partial<HandlerMap> = {}): HandlerMap {
  return {
    CMD_REGISTER: handleRegister,
    INFO_MESSAGE: handleInfoMessage,
    INFO_GOOGLE_SCHOLAR_CITATION_COUNTS: handleCitationCounts,
    INFO_FETCH_GOOGLE_SCHOLAR_CITATION_COUNTS_INTERRUPTED: handleCitationCountsInterrupted,
    ...overrides
  };
}
