export { logger, Logger } from './logger.js';
export type { LogLevel, LogMeta } from './logger.js';
export { ErrorHandler, MonitorError, isMonitorError } from './error-handler.js';
export type { MonitorErrorCode } from './error-handler.js';
export { ConfigManager, expandHome, requireSeqtaCredentials } from './config.js';
export type { DriveConfig, MonitorConfig, SeqtaConfig, SeqtaCredentials } from './config.js';
export { renderMarkdownTable } from './markdown.js';
