export { WebSocketServer, parseClientMessage, buildConsumerUpdates } from './websocket-server.js';
export type { ConsumerUpdateMessage, ClientMessage } from './websocket-server.js';
