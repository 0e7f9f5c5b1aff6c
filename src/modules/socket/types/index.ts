/**
 * Socket Module Types
 */

import type { WebSocket } from 'ws';

/**
 * Per-connection state, created when the socket connects.
 * The server assigns the session id; envelope session ids from the client are ignored.
 */
export interface ConnectionContext {
  ws: WebSocket;
  connectionId: string;
  sessionId: string;
}

export interface SocketStats {
  totalConnections: number;
}
