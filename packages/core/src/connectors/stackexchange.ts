/**
 * StackExchange Connector - questions of one site and tag
 */

import type { WriteAheadCache } from '../cache';
import { MalformedRecordError } from '../errors';
import { RecordStamper, fieldTimestamp } from '../identity';
import { makeNoopLogger, type Logger } from '../logging';
import type { RawRecord, StackExchangeOptions, StampedRecord } from '../schemas';
import { StackExchangeClient, type FetchFn } from '../sources/stackexchange';
import { harvest, replay, sinceToEpoch } from './harvest';
import type { ConnectorDeps, SourceConnector } from './types';

export interface StackExchangeConnectorDeps extends ConnectorDeps {
  fetchFn?: FetchFn;
}

export class StackExchangeConnector implements SourceConnector {
  readonly name = 'StackExchange';
  readonly version = '0.1.0';
  readonly origin: string;
  readonly cache?: WriteAheadCache;
  readonly client: StackExchangeClient;
  private stamper: RecordStamper;
  private logger: Logger;

  constructor(options: StackExchangeOptions, deps: StackExchangeConnectorDeps = {}) {
    this.logger = deps.logger ?? makeNoopLogger();
    this.client = new StackExchangeClient(options, { fetchFn: deps.fetchFn, logger: this.logger });
    this.origin = options.origin || this.client.site;
    this.cache = deps.cache;

    this.stamper = new RecordStamper(
      {
        origin: this.origin,
        backendName: this.name,
        backendVersion: this.version,
        discriminator: question => [questionId(question)],
        updatedAt: fieldTimestamp('last_activity_date')
      },
      deps.clock
    );
  }

  async *fetch(since?: Date): AsyncGenerator<StampedRecord, void, undefined> {
    const minDate = sinceToEpoch(since);

    this.logger.info(
      { site: this.client.site, tagged: this.client.tagged, since: minDate ?? null },
      `Looking for questions at site '${this.client.site}', with tag '${this.client.tagged}'`
    );

    yield* harvest(this.questions(minDate), this.stamper, { cache: this.cache, since: minDate });
  }

  fetchFromCache(): AsyncGenerator<StampedRecord, void, undefined> {
    return replay(this.cache);
  }

  private async *questions(minDate?: number): AsyncGenerator<RawRecord, void, undefined> {
    for await (const page of this.client.getQuestions(minDate)) {
      yield* page;
    }
  }
}

function questionId(question: RawRecord): string | number {
  const id = question.question_id;
  if (typeof id === 'number' || (typeof id === 'string' && id.length > 0)) {
    return id;
  }
  throw new MalformedRecordError("question has no 'question_id'", 'question_id');
}
