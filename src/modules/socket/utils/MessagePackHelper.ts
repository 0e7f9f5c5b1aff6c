/**
 * MessagePack Helper
 * Static utility methods for packing WebSocket frames.
 * Every frame is `{ eventType, eventId, sessionId, payload }`; responses to a
 * request reuse the request's eventId.
 */

import { pack } from 'msgpackr';
import { VOICECHAT_EVENTS, toErrorEventType } from '@/shared/protocol';
import type {
  ResponseAudioPayload,
  ResponseCompletePayload,
  ResponseStatusPayload,
  ResponseTextPayload,
} from '@/shared/protocol';
import { generateId } from '@/shared/utils';

export class MessagePackHelper {
  static packText(
    turnId: string,
    index: number,
    text: string,
    eventId: string,
    sessionId?: string
  ): Uint8Array {
    const payload: ResponseTextPayload = { turnId, index, text };
    return pack({ eventType: VOICECHAT_EVENTS.RESPONSE_TEXT, eventId, sessionId, payload });
  }

  static packAudio(
    turnId: string,
    index: number,
    audio: Uint8Array,
    eventId: string,
    sessionId?: string
  ): Uint8Array {
    const payload: ResponseAudioPayload = { turnId, index, audio };
    return pack({ eventType: VOICECHAT_EVENTS.RESPONSE_AUDIO, eventId, sessionId, payload });
  }

  static packComplete(
    turnId: string,
    fullText: string,
    chunkCount: number,
    eventId: string,
    sessionId?: string
  ): Uint8Array {
    const payload: ResponseCompletePayload = { turnId, fullText, chunkCount };
    return pack({ eventType: VOICECHAT_EVENTS.RESPONSE_COMPLETE, eventId, sessionId, payload });
  }

  static packStatus(
    message: string,
    category: string,
    eventId: string = generateId(),
    sessionId?: string
  ): Uint8Array {
    const payload: ResponseStatusPayload = { message, category };
    return pack({ eventType: VOICECHAT_EVENTS.RESPONSE_STATUS, eventId, sessionId, payload });
  }

  /**
   * Pack acknowledgment response
   * ACK reuses the request's eventType and eventId
   */
  static packAck(
    requestType: string,
    requestEventId: string,
    success: boolean,
    sessionId?: string,
    data: Record<string, unknown> = {}
  ): Uint8Array {
    return pack({
      eventType: requestType,
      eventId: requestEventId,
      sessionId,
      payload: { success, ...data },
    });
  }

  /**
   * Pack error response
   * eventType is the request type with its last segment replaced by "error";
   * the original type travels at top level as requestType
   */
  static packError(
    requestType: string,
    message: string,
    sessionId?: string,
    requestEventId?: string
  ): Uint8Array {
    let errorEventType: string;
    try {
      errorEventType = toErrorEventType(requestType);
    } catch {
      errorEventType = 'error.unknown';
    }

    return pack({
      eventType: errorEventType,
      eventId: requestEventId || generateId(),
      sessionId,
      requestType,
      payload: { message },
    });
  }
}
