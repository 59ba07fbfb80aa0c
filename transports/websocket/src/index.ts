/**
 * @logwire/transport-websocket — WebSocket dialer and development collector.
 */

export { DEFAULT_CLOSE_GRACE_MS, WebSocketConnection, WebSocketDialer } from './websocket-connection.js';
export type { WebSocketDialerOptions } from './websocket-connection.js';
export { LocalCollector } from './collector.js';
export type { LocalCollectorOptions } from './collector.js';
