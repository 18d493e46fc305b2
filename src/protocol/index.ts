export { MCPProtocolHandler, PROTOCOL_VERSION, errorResponse } from './handler.js';
export type { ServerInfo } from './handler.js';
