/**
 * WebSocket Sink
 * Delivers one turn's events to one socket. All frames of a turn carry the
 * eventId of the request that started it, which also serves as the turn id.
 */

import type { WebSocket } from 'ws';
import type { OutputSink, StatusCategory } from '@/modules/conversation';
import { MessagePackHelper, WebSocketUtils } from '../utils';

export class WebSocketSink implements OutputSink {
  constructor(
    private readonly ws: WebSocket,
    private readonly sessionId: string,
    private readonly requestEventId: string
  ) {}

  textChunk(text: string, index: number): void {
    this.send(
      MessagePackHelper.packText(this.requestEventId, index, text, this.requestEventId, this.sessionId),
      'response text'
    );
  }

  audioChunk(audio: Buffer, index: number): void {
    this.send(
      MessagePackHelper.packAudio(this.requestEventId, index, audio, this.requestEventId, this.sessionId),
      'response audio'
    );
  }

  complete(fullText: string, chunkCount: number): void {
    this.send(
      MessagePackHelper.packComplete(
        this.requestEventId,
        fullText,
        chunkCount,
        this.requestEventId,
        this.sessionId
      ),
      'response complete'
    );
  }

  status(message: string, category: StatusCategory): void {
    this.send(
      MessagePackHelper.packStatus(message, category, this.requestEventId, this.sessionId),
      'response status'
    );
  }

  private send(frame: Uint8Array, label: string): void {
    WebSocketUtils.safeSend(this.ws, frame, label);
  }
}
