/**
 * GitBlame Connector - line attribution of every tracked file at a revision
 *
 * The working copy at `gitPath` is cloned on first use and reset to its
 * remote on later runs, so each run blames the same tree for the same rev.
 */

import { existsSync } from 'fs';
import type { WriteAheadCache } from '../cache';
import { RecordStamper } from '../identity';
import { makeNoopLogger, type Logger } from '../logging';
import { GitBlameOptionsSchema, type GitBlameOptions, type StampedRecord } from '../schemas';
import { BlameOutput, type BlameRecord } from '../sources/blame';
import { GitRepository, type GitFactory } from '../sources/git';
import { harvest, replay, sinceToEpoch } from './harvest';
import type { ConnectorDeps, SourceConnector } from './types';

export interface GitBlameConnectorDeps extends ConnectorDeps {
  git?: GitFactory;
}

export class GitBlameConnector implements SourceConnector {
  readonly name = 'GitBlame';
  readonly version = '0.1.0';
  readonly uri: string;
  readonly gitPath: string;
  readonly rev: string;
  readonly origin: string;
  readonly cache?: WriteAheadCache;
  private deps: GitBlameConnectorDeps;
  private logger: Logger;

  constructor(options: GitBlameOptions, deps: GitBlameConnectorDeps = {}) {
    const parsed = GitBlameOptionsSchema.parse(options);
    this.uri = parsed.uri;
    this.gitPath = parsed.gitPath;
    this.rev = parsed.rev;
    // An empty origin falls back to the repository URI
    this.origin = parsed.origin || parsed.uri;
    this.cache = deps.cache;
    this.deps = deps;
    this.logger = deps.logger ?? makeNoopLogger();
  }

  async *fetch(since?: Date): AsyncGenerator<StampedRecord, void, undefined> {
    const minDate = sinceToEpoch(since);

    // Abbreviated groups take their commit time from the commit's first group
    const commitTimes = new Map<string, string>();

    const stamper = new RecordStamper<BlameRecord>(
      {
        origin: this.origin,
        backendName: this.name,
        backendVersion: this.version,
        discriminator: record => [record.file_blamed, record.hash, record.this_line],
        updatedAt: record => record['committer-time'] ?? commitTimes.get(record.hash)
      },
      this.deps.clock
    );

    this.logger.info({ uri: this.uri, gitPath: this.gitPath, rev: this.rev }, 'Blaming git repository');

    yield* harvest(this.attributions(commitTimes), stamper, { cache: this.cache, since: minDate });
  }

  fetchFromCache(): AsyncGenerator<StampedRecord, void, undefined> {
    return replay(this.cache);
  }

  private async *attributions(commitTimes: Map<string, string>): AsyncGenerator<BlameRecord, void, undefined> {
    const repo = await this.openRepository();
    await repo.checkout(this.rev);

    const files = await repo.listFiles();
    this.logger.info({ files: files.length, rev: this.rev }, 'Blaming tracked files');

    for (const file of files) {
      const output = await repo.blame(file);

      for (const record of new BlameOutput(output).analyze()) {
        const committerTime = record['committer-time'];
        if (committerTime !== undefined) {
          commitTimes.set(record.hash, committerTime);
        }
        yield { ...record, file_blamed: file };
      }
    }
  }

  private async openRepository(): Promise<GitRepository> {
    const deps = { git: this.deps.git, logger: this.logger };

    if (!existsSync(this.gitPath)) {
      return GitRepository.clone(this.uri, this.gitPath, deps);
    }

    const repo = new GitRepository(this.uri, this.gitPath, deps);
    await repo.pull();
    return repo;
  }
}
