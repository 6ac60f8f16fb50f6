/**
 * Connector Types - the contract every source connector implements
 */

import type { WriteAheadCache } from '../cache';
import type { Logger } from '../logging';
import type { GitBlameOptions, StackExchangeOptions, StampedRecord } from '../schemas';

export interface SourceConnector {
  readonly name: string;
  readonly version: string;
  readonly origin: string;
  readonly cache?: WriteAheadCache;

  /**
   * Records updated at or after `since`, stamped and written through the
   * cache before each one is yielded. No `since` means from the beginning.
   */
  fetch(since?: Date): AsyncGenerator<StampedRecord, void, undefined>;

  /**
   * Records previously written to the cache, in fetch order. Fails with
   * CacheError when the connector has no cache.
   */
  fetchFromCache(): AsyncGenerator<StampedRecord, void, undefined>;
}

export interface ConnectorDeps {
  cache?: WriteAheadCache;
  logger?: Logger;
  clock?: () => number;
}

export type ConnectorSpec =
  | { kind: 'stackexchange'; options: StackExchangeOptions }
  | { kind: 'gitblame'; options: GitBlameOptions };

export type ConnectorKind = ConnectorSpec['kind'];
