/**
 * GitBlame connector tests
 */

import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { dirname, join } from 'path';
import { GitBlameConnector } from './gitblame';
import { WriteAheadCache } from '../cache';
import { ParseError } from '../errors';
import { computeId } from '../identity';
import type { StampedRecord } from '../schemas';
import type { GitFactory } from '../sources/git';

const HASH_OLD = '589bb080f059834829a2a5955bebfd7c2baa110a';
const HASH_NEW = '51a3b654f252210572297f47597b31527c475fb8';

const BLAME: Record<string, string> = {
  'aaa/otherthing.renamed': [
    `${HASH_NEW} 1 1 1`,
    'author Lin Example',
    'author-mail <lin@example.com>',
    'author-time 1392185366',
    'author-tz -0800',
    'committer Lin Example',
    'committer-mail <lin@example.com>',
    'committer-time 1392185366',
    'committer-tz -0800',
    'summary modify aaa/otherthing',
    `previous ${HASH_OLD} aaa/otherthing`,
    'filename aaa/otherthing',
    '\tsomething',
    `${HASH_NEW} 4 2 1`,
    'filename aaa/otherthing',
    '\tsomething else',
    ''
  ].join('\n'),
  'eee/fff/wildthing': [
    `${HASH_OLD} 1 1 1`,
    'author Eduardo Example',
    'author-mail <eduardo@example.com>',
    'author-time 1344967441',
    'author-tz -0300',
    'committer Eduardo Example',
    'committer-mail <eduardo@example.com>',
    'committer-time 1344967441',
    'committer-tz -0300',
    'summary Create "deeply" nested file',
    'boundary',
    'filename eee/fff/wildthing',
    '\twild',
    ''
  ].join('\n')
};

function createFakeGit(blame: Record<string, string> = BLAME, remoteBranches: string[] = []) {
  const commands: string[][] = [];
  const factory: GitFactory = () => ({
    raw: async (args: string[]) => {
      commands.push(args);
      switch (args[0]) {
        case 'branch':
          return remoteBranches
            .filter(branch => `origin/${branch}` === args[args.length - 1])
            .map(branch => `  origin/${branch}\n`)
            .join('');
        case 'clone': {
          const dest = args[2];
          mkdirSync(join(dest, '.git'), { recursive: true });
          for (const file of Object.keys(blame)) {
            mkdirSync(dirname(join(dest, file)), { recursive: true });
            writeFileSync(join(dest, file), '');
          }
          return '';
        }
        case 'ls-files':
          return Object.keys(blame).join('\0') + '\0';
        case 'blame':
          return blame[args[args.length - 1]] ?? '';
        default:
          return '';
      }
    }
  });
  return { factory, commands };
}

async function collect(items: AsyncIterable<StampedRecord>): Promise<StampedRecord[]> {
  const result: StampedRecord[] = [];
  for await (const item of items) result.push(item);
  return result;
}

describe('GitBlameConnector', () => {
  let root: string;
  let gitPath: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'harvester-blame-'));
    gitPath = join(root, 'newgit');
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('should default the origin to the uri', () => {
    expect(new GitBlameConnector({ uri: 'http://example.com', gitPath }).origin).toBe('http://example.com');
    expect(new GitBlameConnector({ uri: 'http://example.com', gitPath, origin: '' }).origin).toBe('http://example.com');
    expect(new GitBlameConnector({ uri: 'http://example.com', gitPath, origin: 'test' }).origin).toBe('test');
  });

  it('should clone on first use and blame every tracked file', async () => {
    const git = createFakeGit();
    const connector = new GitBlameConnector(
      { uri: '/srv/gittest', gitPath },
      { git: git.factory, clock: () => 1500000000 }
    );

    const items = await collect(connector.fetch());

    expect(git.commands.map(c => c[0])).toEqual(['clone', 'checkout', 'ls-files', 'blame', 'blame']);
    expect(git.commands[1]).toEqual(['checkout', 'HEAD']);
    expect(items).toHaveLength(3);
    expect(items[0]).toEqual({
      backend_name: 'GitBlame',
      backend_version: '0.1.0',
      origin: '/srv/gittest',
      uuid: computeId('/srv/gittest', 'GitBlame', '0.1.0', 'aaa/otherthing.renamed', HASH_NEW, '1'),
      updated_on: 1392185366,
      fetched_on: 1500000000,
      data: {
        hash: HASH_NEW,
        prev_line: '1',
        this_line: '1',
        lines: '1',
        author: 'Lin Example',
        'author-mail': '<lin@example.com>',
        'author-time': '1392185366',
        'author-tz': '-0800',
        committer: 'Lin Example',
        'committer-mail': '<lin@example.com>',
        'committer-time': '1392185366',
        'committer-tz': '-0800',
        summary: 'modify aaa/otherthing',
        previous: `${HASH_OLD} aaa/otherthing`,
        filename: 'aaa/otherthing',
        file_blamed: 'aaa/otherthing.renamed'
      }
    });
  });

  it('should stamp abbreviated groups with their commit time', async () => {
    const git = createFakeGit();
    const items = await collect(new GitBlameConnector({ uri: '/srv/gittest', gitPath }, { git: git.factory }).fetch());

    expect(items[1].data).toEqual({
      hash: HASH_NEW,
      prev_line: '4',
      this_line: '2',
      lines: '1',
      filename: 'aaa/otherthing',
      file_blamed: 'aaa/otherthing.renamed'
    });
    expect(items[1].updated_on).toBe(1392185366);
    expect(items[2].data.boundary).toBe('');
    expect(items[2].updated_on).toBe(1344967441);
  });

  it('should update an existing working copy instead of cloning', async () => {
    mkdirSync(join(gitPath, '.git'), { recursive: true });
    const git = createFakeGit({});
    const connector = new GitBlameConnector({ uri: '/srv/gittest', gitPath, rev: 'RELEASE_1' }, { git: git.factory });

    expect(await collect(connector.fetch())).toEqual([]);
    expect(git.commands).toEqual([
      ['fetch', 'origin'],
      ['checkout', '--detach', '--force', 'origin/HEAD'],
      ['branch', '--remotes', '--list', 'origin/RELEASE_1'],
      ['checkout', 'RELEASE_1'],
      ['ls-files', '-z']
    ]);
  });

  it('should blame the remote tip of a branch on every run', async () => {
    const git = createFakeGit({}, ['feature']);
    const connector = new GitBlameConnector({ uri: '/srv/gittest', gitPath, rev: 'feature' }, { git: git.factory });

    await collect(connector.fetch());
    const firstRun = git.commands.splice(0);
    await collect(connector.fetch());

    expect(firstRun).toEqual([
      ['clone', '/srv/gittest', gitPath],
      ['branch', '--remotes', '--list', 'origin/feature'],
      ['checkout', '--force', '-B', 'feature', 'origin/feature'],
      ['ls-files', '-z']
    ]);
    expect(git.commands).toEqual([
      ['fetch', 'origin'],
      ['checkout', '--detach', '--force', 'origin/HEAD'],
      ['branch', '--remotes', '--list', 'origin/feature'],
      ['checkout', '--force', '-B', 'feature', 'origin/feature'],
      ['ls-files', '-z']
    ]);
  });

  it('should keep the filename on groups that porcelain abbreviates', async () => {
    const git = createFakeGit({
      'lib/renamed.ts': [
        `${HASH_NEW} 1 1 1`,
        'author Lin Example',
        'committer-time 1392185366',
        'summary rename lib/original.ts',
        'filename lib/original.ts',
        '\tconst a = 1;',
        `${HASH_NEW} 3 2 2`,
        '\tconst b = 2;',
        `${HASH_NEW} 4 3`,
        '\tconst c = 3;',
        ''
      ].join('\n')
    });
    const connector = new GitBlameConnector({ uri: '/srv/gittest', gitPath }, { git: git.factory });

    const items = await collect(connector.fetch());

    expect(items).toHaveLength(2);
    expect(items[1].data).toEqual({
      hash: HASH_NEW,
      prev_line: '3',
      this_line: '2',
      lines: '2',
      filename: 'lib/original.ts',
      file_blamed: 'lib/renamed.ts'
    });
    expect(items[1].updated_on).toBe(1392185366);
  });

  it('should skip attributions older than since', async () => {
    const git = createFakeGit();
    const connector = new GitBlameConnector({ uri: '/srv/gittest', gitPath }, { git: git.factory });

    const items = await collect(connector.fetch(new Date('2013-01-01T00:00:00Z')));

    expect(items.map(i => i.data.file_blamed)).toEqual(['aaa/otherthing.renamed', 'aaa/otherthing.renamed']);
  });

  it('should write attributions through the cache', async () => {
    const git = createFakeGit();
    const cache = new WriteAheadCache({ dir: join(root, 'cache') });
    const connector = new GitBlameConnector({ uri: '/srv/gittest', gitPath }, { git: git.factory, cache });

    const fetched = await collect(connector.fetch());
    const commandsAfterFetch = git.commands.length;

    expect(await collect(connector.fetchFromCache())).toEqual(fetched);
    expect(git.commands).toHaveLength(commandsAfterFetch);
  });

  it('should surface malformed blame output', async () => {
    const git = createFakeGit({ 'README.md': `${HASH_OLD} 1 1\nfilename README.md\n` });
    const connector = new GitBlameConnector({ uri: '/srv/gittest', gitPath }, { git: git.factory });

    await expect(collect(connector.fetch())).rejects.toThrow(ParseError);
  });
});
