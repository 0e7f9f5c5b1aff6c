/**
 * WebSocket Configuration
 */

export const websocketConfig = {
  path: '/ws',

  // Maximum frame size (audio uploads are capped separately by MAX_AUDIO_SIZE)
  maxPayload: 10 * 1024 * 1024,

  // Disabled for lower latency with binary data
  perMessageDeflate: false,

  clientTracking: true,
};

/**
 * WebSocket server shutdown configuration
 */
export const websocketShutdownConfig = {
  // Timeout for graceful shutdown (milliseconds)
  shutdownTimeout: 5000,

  maxConnections: 1000,
};
