// Record schemas
export {
  JsonValueSchema,
  RawRecordSchema,
  StampedRecordSchema,
  type JsonValue,
  type RawRecord,
  type StampedRecord
} from './record';

// Connector and cache option schemas
export {
  CacheOptionsSchema,
  StackExchangeOptionsSchema,
  GitBlameOptionsSchema,
  STACKEXCHANGE_API_URL,
  STACKEXCHANGE_API_VERSION,
  MAX_QUESTIONS,
  type CacheOptions,
  type StackExchangeOptions,
  type GitBlameOptions
} from './connector';
