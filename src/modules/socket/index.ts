/**
 * Socket Module Exports
 */

export { initializeSocketServer, getSocketStats, shutdownSocketServer } from './socket.server';
export { WebSocketSink } from './services';
export { handleWebSocketMessage } from './handlers';
export { MessagePackHelper, WebSocketUtils } from './utils';
export type { ConnectionContext, SocketStats } from './types';
