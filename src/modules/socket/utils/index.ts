export { MessagePackHelper } from './MessagePackHelper';
export { WebSocketUtils } from './WebSocketUtils';
