/**
 * Wire Protocol
 * Event names, envelopes and payload shapes exchanged over the voice socket
 */

export const VOICECHAT_EVENTS = {
  // Server -> client
  CONNECTION_ACK: 'voicechat.connection.ack',
  RESPONSE_TEXT: 'voicechat.response.text',
  RESPONSE_AUDIO: 'voicechat.response.audio',
  RESPONSE_COMPLETE: 'voicechat.response.complete',
  RESPONSE_STATUS: 'voicechat.response.status',

  // Client -> server
  SESSION_START: 'voicechat.session.start',
  SESSION_RESET: 'voicechat.session.reset',
  TURN_TEXT: 'voicechat.turn.text',
  TURN_AUDIO: 'voicechat.turn.audio',
  TURN_STOP: 'voicechat.turn.stop',
} as const;

export type VoicechatEventType = (typeof VOICECHAT_EVENTS)[keyof typeof VOICECHAT_EVENTS];

export enum ErrorCode {
  INVALID_PAYLOAD = 'INVALID_PAYLOAD',
  SESSION_ERROR = 'SESSION_ERROR',
  CONNECTION_ERROR = 'CONNECTION_ERROR',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

/**
 * Envelope of every frame after MessagePack decoding
 */
export interface UnpackedMessage {
  eventType?: string;
  eventId?: string;
  sessionId?: string;
  payload?: unknown;
}

export interface SessionStartPayload {
  mode?: string;
  voice?: string;
  language?: string;
}

export interface TurnTextPayload {
  text: string;
  interrupted?: boolean;
}

export interface TurnAudioPayload {
  audio: Uint8Array;
  mimeType?: string;
  interrupted?: boolean;
}

export interface ResponseTextPayload {
  turnId: string;
  index: number;
  text: string;
}

export interface ResponseAudioPayload {
  turnId: string;
  index: number;
  audio: Uint8Array;
}

export interface ResponseCompletePayload {
  turnId: string;
  fullText: string;
  chunkCount: number;
}

export interface ResponseStatusPayload {
  message: string;
  category: string;
}

/**
 * Convert a request event type into its error event type
 * e.g. "voicechat.turn.text" -> "voicechat.turn.error"
 */
export function toErrorEventType(requestType: string): string {
  const parts = requestType.split('.');
  if (parts.length < 3 || parts.some((part) => part.length === 0)) {
    throw new Error(`Cannot derive error event type from "${requestType}"`);
  }
  return [...parts.slice(0, -1), 'error'].join('.');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isOptionalString(value: unknown): boolean {
  return value === undefined || typeof value === 'string';
}

function isOptionalBoolean(value: unknown): boolean {
  return value === undefined || typeof value === 'boolean';
}

export function isSessionStartPayload(payload: unknown): payload is SessionStartPayload {
  if (payload === undefined) return true;
  return (
    isRecord(payload) &&
    isOptionalString(payload.mode) &&
    isOptionalString(payload.voice) &&
    isOptionalString(payload.language)
  );
}

export function isTurnTextPayload(payload: unknown): payload is TurnTextPayload {
  return (
    isRecord(payload) && typeof payload.text === 'string' && isOptionalBoolean(payload.interrupted)
  );
}

export function isTurnAudioPayload(payload: unknown): payload is TurnAudioPayload {
  return (
    isRecord(payload) &&
    payload.audio instanceof Uint8Array &&
    isOptionalString(payload.mimeType) &&
    isOptionalBoolean(payload.interrupted)
  );
}
