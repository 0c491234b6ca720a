/**
 * @account-link/http-server
 *
 * Express server for the account link callback
 */

export { LinkHttpServer, type LinkHttpServerOptions } from './server/link-http-server.js';

export * from './server/routes/health-routes.js';
export * from './server/routes/callback-routes.js';
export * from './server/routes/success-routes.js';
export { buildHealthResponse, type HealthResponse, type HealthResponseOptions } from './server/responses/health-response.js';
