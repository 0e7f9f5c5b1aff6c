/**
 * WebSocket utility functions for safe operations
 */

import { WebSocket } from 'ws';
import type { RawData } from 'ws';
import { logger, errorMessage, toError } from '@/shared/utils';

export class WebSocketUtils {
  /**
   * Safely close a WebSocket connection with error handling
   */
  static safeClose(ws: WebSocket | undefined, label: string, code = 1000): void {
    if (!ws || ws.readyState === WebSocket.CLOSED) return;

    try {
      ws.close(code);
    } catch (error) {
      logger.warn(`Error closing ${label} WebSocket`, { error: errorMessage(error) });
    }
  }

  /**
   * Check if WebSocket is in a state where it can send messages
   */
  static canSend(ws: WebSocket | undefined): ws is WebSocket {
    return ws !== undefined && ws.readyState === WebSocket.OPEN;
  }

  /**
   * Safely send data over WebSocket with error handling
   * @returns false when the socket is gone or the send failed
   */
  static safeSend(ws: WebSocket | undefined, data: Uint8Array, label: string): boolean {
    if (!this.canSend(ws)) {
      logger.debug(`Cannot send ${label} - socket not open`);
      return false;
    }

    try {
      ws.send(data);
      return true;
    } catch (error) {
      logger.error(`Error sending ${label}`, { error: toError(error) });
      return false;
    }
  }

  /**
   * Flatten the frame payload shapes `ws` can deliver into one byte array
   */
  static toBytes(data: RawData): Uint8Array {
    if (Array.isArray(data)) {
      return Buffer.concat(data);
    }
    if (data instanceof ArrayBuffer) {
      return new Uint8Array(data);
    }
    return data;
  }
}
