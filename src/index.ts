/**
 * threadscan - streaming search over ChatGPT and Claude conversation exports
 */

export * from './model/index.js';
export * from './errors/index.js';
export * from './ingest/index.js';
export * from './search/index.js';
export * from './thread/index.js';
export * from './stats/index.js';
export * from './export/index.js';
export { decodeJsonArray, openSource, readRecords, type ExportSource, type SourceFactory, type RawRecord, type Chunk } from './stream/index.js';
export { loadConfig, getConfig, setConfig, resetConfig, ConfigError, type Config } from './config/index.js';
export { slugify, formatDate, formatTimestamp } from './utils/index.js';
export { version } from './version.js';
