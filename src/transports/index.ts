/**
 * Transport exports
 */

export { createHttpTransport } from './http.js';
export { StdioTransport } from './stdio.js';
export type { StdioStreams } from './stdio.js';
