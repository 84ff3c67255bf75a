/**
 * Web Module Index
 */

export {
  WebServer,
  createApp,
  isPublicPath,
  PUBLIC_PATH_PREFIXES,
  type WebServerConfig,
  type WebServerState,
} from './server';
export { createQueueRoutes } from './routes/queue';
export { createLogRoutes, DEFAULT_LOG_LIMIT, SSE_HEARTBEAT_MS } from './routes/logs';
