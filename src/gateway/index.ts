/**
 * Gateway module public API.
 */

export { createGatewayServer } from './server.js';
export type { GatewayOptions, GatewayServer } from './server.js';
export { RunBodySchema } from './api/run.js';
