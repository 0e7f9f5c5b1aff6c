/**
 * Native WebSocket Server Initialization
 * One conversation session per connection; frames are MessagePack envelopes
 */

import { WebSocketServer } from 'ws';
import type { WebSocket, RawData } from 'ws';
import type { IncomingMessage, Server as HTTPServer } from 'http';
import { VOICECHAT_EVENTS } from '@/shared/protocol';
import { logger, generateId, toError } from '@/shared/utils';
import { websocketShutdownConfig, websocketConfig } from '@/shared/config';
import type { ConversationController } from '@/modules/conversation';
import type { ConnectionContext, SocketStats } from './types';
import { MessagePackHelper, WebSocketUtils } from './utils';
import { handleWebSocketMessage, handleConnectionError } from './handlers';

/**
 * Initialize WebSocket server
 */
export function initializeSocketServer(
  httpServer: HTTPServer,
  controller: ConversationController
): WebSocketServer {
  logger.info('Initializing native WebSocket server with MessagePack');

  const wss = new WebSocketServer({
    server: httpServer,
    path: websocketConfig.path,
    maxPayload: websocketConfig.maxPayload,
    perMessageDeflate: websocketConfig.perMessageDeflate,
    clientTracking: websocketConfig.clientTracking,
  });

  wss.on('connection', (ws: WebSocket, request: IncomingMessage) => {
    if (wss.clients.size > websocketShutdownConfig.maxConnections) {
      logger.warn('Connection limit reached, refusing client', {
        maxConnections: websocketShutdownConfig.maxConnections,
      });
      WebSocketUtils.safeClose(ws, 'over limit', 1013);
      return;
    }
    handleConnection(ws, request, controller);
  });

  wss.on('error', (error: Error) => {
    logger.error('WebSocket server error', error);
  });

  logger.info('WebSocket server initialized successfully', { path: websocketConfig.path });

  return wss;
}

/**
 * Handle new WebSocket connection
 */
function handleConnection(
  ws: WebSocket,
  request: IncomingMessage,
  controller: ConversationController
): void {
  const context: ConnectionContext = {
    ws,
    connectionId: generateId(),
    sessionId: generateId(),
  };

  logger.info('Client connected', {
    connectionId: context.connectionId,
    sessionId: context.sessionId,
    clientIP: request.socket.remoteAddress || 'unknown',
    userAgent: request.headers['user-agent'] || 'unknown',
  });

  ws.on('message', (data: RawData, isBinary: boolean) => {
    void handleWebSocketMessage(context, data, isBinary, controller);
  });

  ws.on('close', (code: number, reason: Buffer) => {
    logger.info('Client disconnected', {
      connectionId: context.connectionId,
      sessionId: context.sessionId,
      code,
      reason: reason.toString(),
    });

    controller.endSession(context.sessionId).catch((error: unknown) => {
      logger.error('Failed to end session on disconnect', {
        sessionId: context.sessionId,
        error: toError(error),
      });
    });
  });

  ws.on('error', (error: Error) => {
    handleConnectionError(ws, error, context.sessionId);
  });

  // connection.ack is not a response to a request, so it gets a fresh eventId
  WebSocketUtils.safeSend(
    ws,
    MessagePackHelper.packAck(VOICECHAT_EVENTS.CONNECTION_ACK, generateId(), true, context.sessionId),
    'connection ack'
  );
}

/**
 * Get socket server statistics
 */
export function getSocketStats(wss: WebSocketServer): SocketStats {
  return { totalConnections: wss.clients.size };
}

/**
 * Graceful shutdown for WebSocket server
 * Closes every client, then the server; forced after the shutdown timeout
 */
export async function shutdownSocketServer(wss: WebSocketServer): Promise<void> {
  logger.info('Shutting down WebSocket server', { clients: wss.clients.size });

  const clientsClosed = Promise.all(
    [...wss.clients].map(
      (ws) =>
        new Promise<void>((resolve) => {
          ws.once('close', () => resolve());
          WebSocketUtils.safeClose(ws, 'shutdown', 1001);
        })
    )
  );

  let forceTimer: ReturnType<typeof setTimeout> | undefined;
  const timedOut = new Promise<boolean>((resolve) => {
    forceTimer = setTimeout(() => resolve(true), websocketShutdownConfig.shutdownTimeout);
  });

  const forced = await Promise.race([clientsClosed.then(() => false), timedOut]);
  clearTimeout(forceTimer);

  if (forced) {
    logger.warn('WebSocket clients force terminated after timeout');
    wss.clients.forEach((ws) => ws.terminate());
  }

  await new Promise<void>((resolve) => {
    wss.close(() => resolve());
  });
  logger.info('WebSocket server closed');
}
