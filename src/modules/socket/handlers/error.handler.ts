/**
 * Centralized Error Handling for WebSocket Events
 * Clients only ever see the generic message; detail stays in the logs
 */

import type { WebSocket } from 'ws';
import { ErrorCode } from '@/shared/protocol';
import { logger } from '@/shared/utils';
import { MessagePackHelper, WebSocketUtils } from '../utils';

/**
 * Send error event to client
 * @param requestType - The original request event type (e.g., "voicechat.turn.text")
 */
export function sendError(
  ws: WebSocket,
  code: ErrorCode,
  message: string,
  requestType: string,
  sessionId?: string,
  requestEventId?: string
): void {
  const frame = MessagePackHelper.packError(requestType, message, sessionId, requestEventId);
  WebSocketUtils.safeSend(ws, frame, 'error');

  logger.warn('Error sent to client', {
    sessionId,
    code,
    message,
    requestType,
  });
}

/**
 * Handle invalid payload errors
 */
export function handleInvalidPayload(
  ws: WebSocket,
  eventType: string,
  reason: string,
  requestMessage?: { sessionId?: string; eventId?: string }
): void {
  logger.warn('Invalid payload received', {
    sessionId: requestMessage?.sessionId,
    eventType,
    reason,
  });

  sendError(
    ws,
    ErrorCode.INVALID_PAYLOAD,
    `Invalid payload for ${eventType}`,
    eventType,
    requestMessage?.sessionId,
    requestMessage?.eventId
  );
}

/**
 * Handle internal errors raised while serving a request
 */
export function handleInternalError(
  ws: WebSocket,
  error: Error,
  requestType: string,
  sessionId?: string,
  requestEventId?: string
): void {
  logger.error('Internal error', {
    sessionId,
    requestType,
    error: error.message,
    stack: error.stack,
  });

  sendError(ws, ErrorCode.INTERNAL_ERROR, 'Internal error', requestType, sessionId, requestEventId);
}

/**
 * Handle connection errors
 */
export function handleConnectionError(
  ws: WebSocket,
  error: Error,
  sessionId?: string
): void {
  logger.error('Connection error', {
    sessionId,
    error: error.message,
    stack: error.stack,
  });

  sendError(ws, ErrorCode.CONNECTION_ERROR, 'Connection error occurred', 'error.connection', sessionId);
}
