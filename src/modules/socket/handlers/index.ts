export { handleWebSocketMessage } from './message.handler';
export {
  sendError,
  handleInvalidPayload,
  handleInternalError,
  handleConnectionError,
} from './error.handler';
