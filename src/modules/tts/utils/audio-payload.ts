/**
 * Audio payload normalisation
 * SDK responses arrive as buffers, blobs or byte streams depending on version and runtime
 */

interface BlobLike {
  arrayBuffer(): Promise<ArrayBuffer>;
}

function isBlobLike(value: object): value is BlobLike {
  return 'arrayBuffer' in value && typeof value.arrayBuffer === 'function';
}

function isAsyncIterable(value: object): value is AsyncIterable<unknown> {
  return Symbol.asyncIterator in value;
}

function chunkToBuffer(chunk: unknown): Buffer {
  if (chunk instanceof Uint8Array) {
    return Buffer.from(chunk);
  }
  if (typeof chunk === 'string') {
    return Buffer.from(chunk, 'binary');
  }
  throw new Error('Unsupported audio stream chunk');
}

export async function collectAudio(response: unknown): Promise<Buffer> {
  if (response instanceof Uint8Array) {
    return Buffer.from(response);
  }
  if (response instanceof ArrayBuffer) {
    return Buffer.from(new Uint8Array(response));
  }
  if (typeof response === 'object' && response !== null) {
    if (isAsyncIterable(response)) {
      const parts: Buffer[] = [];
      for await (const chunk of response) {
        parts.push(chunkToBuffer(chunk));
      }
      return Buffer.concat(parts);
    }
    if (isBlobLike(response)) {
      return Buffer.from(new Uint8Array(await response.arrayBuffer()));
    }
  }
  throw new Error('Unsupported audio response');
}
