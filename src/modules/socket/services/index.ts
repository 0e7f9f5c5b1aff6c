export { WebSocketSink } from './websocket-sink.service';
