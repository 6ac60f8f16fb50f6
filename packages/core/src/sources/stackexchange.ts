/**
 * StackExchange Source
 *
 * Walks the questions endpoint of a StackExchange site page by page, most
 * recently active first. The API reports quota and whether another page
 * exists on every response.
 */

import { z } from 'zod';
import { RetrievalError, errorMessage } from '../errors';
import { makeNoopLogger, type Logger } from '../logging';
import {
  RawRecordSchema,
  StackExchangeOptionsSchema,
  type RawRecord,
  type StackExchangeOptions
} from '../schemas';

// Filters are immutable and non-expiring. This one returns every field of a
// question, including its answers and comments.
export const QUESTIONS_FILTER = 'Bf*y*ByQD_upZqozgU6lXL_62USGOoV3)MFNgiHqHpmO_Y-jHR';

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

const QuestionsPageSchema = z.object({
  items: z.array(RawRecordSchema),
  page_size: z.number(),
  total: z.number(),
  has_more: z.boolean(),
  quota_remaining: z.number(),
  quota_max: z.number()
});

export type QuestionsPage = z.infer<typeof QuestionsPageSchema>;

export interface StackExchangeClientDeps {
  fetchFn?: FetchFn;
  logger?: Logger;
}

export class StackExchangeClient {
  readonly site: string;
  readonly tagged: string;
  readonly maxQuestions: number;
  private token: string;
  private baseUrl: string;
  private apiVersion: string;
  private fetchFn: FetchFn;
  private logger: Logger;

  constructor(options: StackExchangeOptions, deps: StackExchangeClientDeps = {}) {
    const parsed = StackExchangeOptionsSchema.parse(options);
    this.site = parsed.site;
    this.tagged = parsed.tagged;
    this.token = parsed.token;
    this.maxQuestions = parsed.maxQuestions;
    this.baseUrl = parsed.baseUrl;
    this.apiVersion = parsed.apiVersion;
    this.fetchFn = deps.fetchFn ?? ((input, init) => fetch(input, init));
    this.logger = deps.logger ?? makeNoopLogger();
  }

  /**
   * Yields one array of questions per page, starting at page 1, until the
   * API reports no more pages. `minDate` is a lower bound in epoch seconds.
   */
  async *getQuestions(minDate?: number): AsyncGenerator<RawRecord[], void, undefined> {
    let page = 1;
    let fetched = 0;

    for (;;) {
      const data = await this.requestPage(page, minDate);

      fetched += Math.min(data.page_size, data.total);
      this.logStatus(data, fetched);

      if (data.items.length === 0) return;
      yield data.items;

      if (!data.has_more) return;
      page++;
    }
  }

  buildUrl(page: number, minDate?: number): string {
    const url = new URL(`${this.baseUrl.replace(/\/+$/, '')}/${this.apiVersion}/questions`);
    url.searchParams.set('page', String(page));
    url.searchParams.set('pagesize', String(this.maxQuestions));
    url.searchParams.set('order', 'desc');
    url.searchParams.set('sort', 'activity');
    url.searchParams.set('tagged', this.tagged);
    url.searchParams.set('site', this.site);
    url.searchParams.set('key', this.token);
    url.searchParams.set('filter', QUESTIONS_FILTER);

    if (minDate !== undefined) {
      url.searchParams.set('min', String(Math.floor(minDate)));
    }

    return url.toString();
  }

  private async requestPage(page: number, minDate?: number): Promise<QuestionsPage> {
    const url = this.buildUrl(page, minDate);

    let response: Response;
    try {
      response = await this.fetchFn(url, {
        headers: {
          'Accept': 'application/json',
          'User-Agent': 'harvester/0.1.0'
        }
      });
    } catch (error) {
      throw new RetrievalError(`StackExchange request failed: ${errorMessage(error)}`, { cause: error });
    }

    if (!response.ok) {
      const body = await readErrorBody(response);
      throw new RetrievalError(`StackExchange API error: ${response.status}`, {
        status: response.status,
        body
      });
    }

    let json: unknown;
    try {
      json = await response.json();
    } catch (error) {
      throw new RetrievalError(`StackExchange returned invalid JSON: ${errorMessage(error)}`, { cause: error });
    }

    const parsed = QuestionsPageSchema.safeParse(json);
    if (!parsed.success) {
      throw new RetrievalError(`Unexpected StackExchange response: ${parsed.error.message}`, {
        status: response.status,
        body: json
      });
    }
    return parsed.data;
  }

  private logStatus(data: QuestionsPage, fetched: number): void {
    this.logger.info(
      { quotaRemaining: data.quota_remaining, quotaMax: data.quota_max },
      `Rate limit: ${data.quota_remaining}/${data.quota_max}`
    );

    if (data.total === 0) {
      this.logger.info('No questions were found.');
    } else {
      this.logger.info({ fetched, total: data.total }, `Fetching questions: ${fetched}/${data.total}`);
    }
  }
}

async function readErrorBody(response: Response): Promise<unknown> {
  const text = await response.text();
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}
