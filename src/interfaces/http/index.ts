export { default as webhookRoutes } from './webhook-routes.js';
export type { WebhookRouteOptions } from './webhook-routes.js';
export { default as queryRoutes } from './query-routes.js';
export { withTimeout } from './timeout.js';
