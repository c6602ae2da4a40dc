import { z } from 'zod';
import { ClientType } from '../types.js';

export const wsActions = [
  'CMD_REGISTER',
  'INFO_MESSAGE',
  'INFO_GOOGLE_SCHOLAR_CITATION_COUNTS',
  'INFO_FETCH_GOOGLE_SCHOLAR_CITATION_COUNTS_INTERRUPTED',
  'INFO_CONFIGURATION',
  'HEARTBEAT'
] as const;

export type WsAction = (typeof wsActions)[number];

export const WsAction = {
  CmdRegister: 'CMD_REGISTER',
  InfoMessage: 'INFO_MESSAGE',
  InfoCitationCounts: 'INFO_GOOGLE_SCHOLAR_CITATION_COUNTS',
  InfoCitationCountsInterrupted: 'INFO_FETCH_GOOGLE_SCHOLAR_CITATION_COUNTS_INTERRUPTED',
  InfoConfiguration: 'INFO_CONFIGURATION',
  Heartbeat: 'HEARTBEAT'
} as const satisfies Record<string, WsAction>;

export const inboundActions = [
  WsAction.CmdRegister,
  WsAction.InfoMessage,
  WsAction.InfoCitationCounts,
  WsAction.InfoCitationCountsInterrupted
] as const;

export type InboundAction = (typeof inboundActions)[number];

const inboundSet: ReadonlySet<WsAction> = new Set(inboundActions);

// HEARTBEAT and INFO_CONFIGURATION are only ever sent by the server.
export function isInboundAction(action: WsAction): action is InboundAction {
  return inboundSet.has(action);
}

export type Payload = Record<string, unknown>;

export interface MessageEnvelope {
  action: WsAction;
  payload: Payload;
}

const envelopeSchema = z.object({
  action: z.enum(wsActions),
  payload: z.record(z.unknown()).default({})
});

export type DecodeResult = { ok: true; envelope: MessageEnvelope } | { ok: false; reason: string };

export function decodeEnvelope(raw: string): DecodeResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return { ok: false, reason: 'not valid JSON' };
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return { ok: false, reason: 'envelope must be a JSON object' };
  }
  if (!('action' in parsed)) return { ok: false, reason: 'missing action' };

  const result = envelopeSchema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue?.path[0] === 'payload' ? 'payload' : 'action';
    return { ok: false, reason: field === 'action' ? `unknown action: ${String(parsed.action)}` : 'payload must be a JSON object' };
  }
  return { ok: true, envelope: result.data };
}

export function encodeEnvelope(action: WsAction, payload: Payload = {}): string {
  return JSON.stringify({ action, payload });
}

/** Durations are in milliseconds. */
export type ConfigurationPayload = {
  connectionLostTimeout: number;
  heartbeatEnabled: boolean;
  heartbeatInterval: number;
  heartbeatToleranceFactor: number;
};

export const registerPayloadSchema = z.object({
  clientType: z.string().trim().min(1).refine((t) => t !== ClientType.Unknown, 'clientType UNKNOWN cannot be registered'),
  clientUid: z.string().trim().min(1)
});

export type RegisterPayload = z.infer<typeof registerPayloadSchema>;

export const infoMessagePayloadSchema = z.object({
  messageType: z.enum(['info', 'warning', 'error']).default('info'),
  message: z.string()
});

export type InfoMessagePayload = z.infer<typeof infoMessagePayloadSchema>;
