/**
 * @harvester/core
 *
 * Incremental harvesting: write-ahead cache, record identity and the
 * StackExchange and GitBlame connectors.
 */

// Schemas and record types
export * from './schemas';

// Errors
export * from './errors';

// Logging
export { makeLogger, makeNoopLogger, type Logger, type LoggerOptions } from './logging';

// Record identity
export {
  computeId,
  extractTimestamp,
  fieldTimestamp,
  RecordStamper,
  type IdComponent,
  type RecordIdentity,
  type TimestampExtractor
} from './identity';

// Cache
export { WriteAheadCache } from './cache';

// Sources (retrieval strategies)
export { StackExchangeClient, QUESTIONS_FILTER, type FetchFn, type QuestionsPage } from './sources/stackexchange';
export { GitRepository, defaultGitFactory, type GitFactory, type GitRunner } from './sources/git';
export { BlameOutput, type BlameRecord } from './sources/blame';

// Connectors
export * from './connectors';
