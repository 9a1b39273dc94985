export { StreamServer } from './websocket-server.js';
export type { StreamServerOptions } from './websocket-server.js';
