/**
 * WebSocket Message Handler
 * Decodes MessagePack frames and routes them to the conversation controller
 */

import { unpack } from 'msgpackr';
import type { RawData } from 'ws';
import { logger, toError } from '@/shared/utils';
import { STATUS_MESSAGES, ConversationErrorType, isConversationError } from '@/shared/errors';
import {
  VOICECHAT_EVENTS,
  ErrorCode,
  isSessionStartPayload,
  isTurnAudioPayload,
  isTurnTextPayload,
} from '@/shared/protocol';
import type { UnpackedMessage } from '@/shared/protocol';
import { parseMode } from '@/modules/session';
import type { ConversationController } from '@/modules/conversation';
import type { ConnectionContext } from '../types';
import { WebSocketSink } from '../services';
import { MessagePackHelper, WebSocketUtils } from '../utils';
import { handleInternalError, handleInvalidPayload, sendError } from './error.handler';

function isOptionalString(value: unknown): boolean {
  return value === undefined || typeof value === 'string';
}

/**
 * Validate that unpacked message has correct envelope structure
 */
function isValidUnpackedMessage(data: unknown): data is UnpackedMessage {
  if (typeof data !== 'object' || data === null) {
    return false;
  }
  return (
    isOptionalString(Reflect.get(data, 'eventType')) &&
    isOptionalString(Reflect.get(data, 'eventId')) &&
    isOptionalString(Reflect.get(data, 'sessionId'))
  );
}

export async function handleWebSocketMessage(
  context: ConnectionContext,
  raw: RawData,
  isBinary: boolean,
  controller: ConversationController
): Promise<void> {
  const { ws, connectionId, sessionId } = context;

  if (!WebSocketUtils.canSend(ws)) {
    logger.warn('WebSocket not open, skipping message', { connectionId, readyState: context.ws.readyState });
    return;
  }

  if (!isBinary) {
    logger.warn('Received text frame (expected binary MessagePack)', { connectionId });
    sendError(ws, ErrorCode.INVALID_PAYLOAD, 'Invalid message format', 'error.unknown', sessionId);
    return;
  }

  let data: UnpackedMessage;
  try {
    const unpacked: unknown = unpack(WebSocketUtils.toBytes(raw));
    if (!isValidUnpackedMessage(unpacked)) {
      logger.warn('Invalid message structure', { connectionId });
      sendError(ws, ErrorCode.INVALID_PAYLOAD, 'Invalid message structure', 'error.unknown', sessionId);
      return;
    }
    data = unpacked;
  } catch (error) {
    logger.error('Failed to unpack MessagePack data', { connectionId, error: toError(error) });
    sendError(ws, ErrorCode.INVALID_PAYLOAD, 'Invalid message format', 'error.unknown', sessionId);
    return;
  }

  const eventType = data.eventType ?? 'error.unknown';
  const eventId = data.eventId ?? '';
  const request = { sessionId, eventId };

  if (!data.eventId) {
    handleInvalidPayload(ws, eventType, 'missing eventId', request);
    return;
  }

  try {
    switch (data.eventType) {
      case VOICECHAT_EVENTS.SESSION_START: {
        if (!isSessionStartPayload(data.payload)) {
          handleInvalidPayload(ws, eventType, 'expected { mode?, voice?, language? }', request);
          return;
        }
        const payload = data.payload ?? {};
        const summary = await controller.startSession(sessionId, parseMode(payload.mode), {
          voice: payload.voice,
          language: payload.language,
        });
        WebSocketUtils.safeSend(
          ws,
          MessagePackHelper.packAck(eventType, eventId, true, sessionId, { ...summary }),
          'session start ack'
        );
        break;
      }

      case VOICECHAT_EVENTS.TURN_TEXT: {
        if (!isTurnTextPayload(data.payload)) {
          handleInvalidPayload(ws, eventType, 'expected { text, interrupted? }', request);
          return;
        }
        const sink = new WebSocketSink(ws, sessionId, eventId);
        await controller.handleText(sessionId, data.payload.text, sink, {
          interrupted: data.payload.interrupted,
        });
        break;
      }

      case VOICECHAT_EVENTS.TURN_AUDIO: {
        if (!isTurnAudioPayload(data.payload)) {
          handleInvalidPayload(ws, eventType, 'expected { audio, mimeType?, interrupted? }', request);
          return;
        }
        const sink = new WebSocketSink(ws, sessionId, eventId);
        await controller.handleAudio(
          sessionId,
          Buffer.from(data.payload.audio),
          data.payload.mimeType,
          sink,
          { interrupted: data.payload.interrupted }
        );
        break;
      }

      case VOICECHAT_EVENTS.TURN_STOP: {
        const stopped = controller.stop(sessionId);
        WebSocketUtils.safeSend(
          ws,
          MessagePackHelper.packAck(eventType, eventId, true, sessionId, { stopped }),
          'turn stop ack'
        );
        if (stopped) {
          WebSocketUtils.safeSend(
            ws,
            MessagePackHelper.packStatus(
              STATUS_MESSAGES[ConversationErrorType.CANCELLED],
              ConversationErrorType.CANCELLED,
              eventId,
              sessionId
            ),
            'turn stop status'
          );
        }
        break;
      }

      case VOICECHAT_EVENTS.SESSION_RESET: {
        const summary = await controller.reset(sessionId);
        WebSocketUtils.safeSend(
          ws,
          MessagePackHelper.packAck(eventType, eventId, true, sessionId, { ...summary }),
          'session reset ack'
        );
        break;
      }

      default: {
        logger.warn('Unknown event type', { connectionId, eventType });
        sendError(ws, ErrorCode.INVALID_PAYLOAD, 'Unknown event type', eventType, sessionId, eventId);
      }
    }
  } catch (error) {
    if (isConversationError(error)) {
      sendError(ws, ErrorCode.SESSION_ERROR, error.userMessage, eventType, sessionId, eventId);
      return;
    }
    handleInternalError(ws, toError(error), eventType, sessionId, eventId);
  }
}
