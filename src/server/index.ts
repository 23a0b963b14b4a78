/**
 * Server Module Exports
 */

export { ApiServer, type ServerConfig } from './express.js';
export { requestLogger, redactPath, formatRequestLog, type RequestLogEntry } from './request-log.js';
