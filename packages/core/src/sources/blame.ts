/**
 * Parser for `git blame --porcelain` output.
 *
 * Each group opens with `<hash> <prev_line> <this_line> <lines>`. The first
 * group of a commit carries its metadata (author, committer, summary, ...);
 * later groups of the same commit are abbreviated to the header and a
 * `filename` line. Lines of blamed content start with a TAB, and the
 * remaining lines of a multi-line group repeat a three-field header.
 */

import { ParseError } from '../errors';

export type BlameRecord = Record<string, string>;

// Fields every group carries; everything else is commit metadata
const GROUP_FIELDS = new Set(['hash', 'prev_line', 'this_line', 'lines', 'filename']);

const HASH = /^[0-9a-f]{40}(?:[0-9a-f]{24})?$/;
const LINE_NO = /^\d+$/;

type State = 'header' | 'group' | 'filename' | 'content';

export class BlameOutput {
  constructor(readonly text: string) {}

  /**
   * Attribution records in the order their groups appear. Metadata is
   * emitted once per commit; repeated groups keep only the group fields.
   */
  analyze(): BlameRecord[] {
    const records: BlameRecord[] = [];
    const seen = new Set<string>();
    const described = new Set<string>();
    // Last filename of each commit; porcelain omits it on repeated groups
    const filenames = new Map<string, string>();

    let state: State = 'header';
    let current: BlameRecord | null = null;
    let abbreviated = false;
    let last: BlameRecord | null = null;

    const close = (record: BlameRecord) => {
      const filename = record.filename ?? filenames.get(record.hash);
      if (filename !== undefined) {
        record.filename = filename;
        filenames.set(record.hash, filename);
      }
      records.push(record);
      if (!abbreviated && Object.keys(record).some(key => !GROUP_FIELDS.has(key))) {
        described.add(record.hash);
      }
    };

    const lines = this.text.split('\n');
    if (lines[lines.length - 1] === '') lines.pop();

    for (const [index, raw] of lines.entries()) {
      const lineNo = index + 1;
      const line = raw.endsWith('\r') ? raw.slice(0, -1) : raw;

      if (state === 'content') {
        if (!line.startsWith('\t')) {
          throw new ParseError('expected a line of blamed content', lineNo);
        }
        state = 'header';
        continue;
      }

      if (state === 'filename' && line.startsWith('\t')) {
        state = 'header';
        continue;
      }

      if (state === 'header' || state === 'filename') {
        const tokens = line.split(' ');

        if (tokens.length === 3 && last !== null && tokens[0] === last.hash && isHeader(tokens)) {
          // Next line of the previous group
          state = 'content';
          continue;
        }

        if (tokens.length !== 4 || !isHeader(tokens)) {
          throw new ParseError(`invalid blame header '${line}'`, lineNo);
        }

        const [hash, prevLine, thisLine, count] = tokens;
        const key = `${hash} ${prevLine} ${thisLine}`;
        abbreviated = described.has(hash) || seen.has(key);
        seen.add(key);

        current = { hash, prev_line: prevLine, this_line: thisLine, lines: count };
        state = 'group';
        continue;
      }

      // Inside a group
      const group: BlameRecord = current ?? {};

      if (line.startsWith('\t')) {
        // Repeated group without a filename line
        close(group);
        last = group;
        current = null;
        state = 'header';
        continue;
      }

      const space = line.indexOf(' ');
      const field = space < 0 ? line : line.slice(0, space);
      const value = space < 0 ? '' : line.slice(space + 1);

      if (field.length === 0) {
        throw new ParseError('empty blame field', lineNo);
      }

      if (field === 'filename') {
        group.filename = value;
        close(group);
        last = group;
        current = null;
        state = 'filename';
        continue;
      }

      if (!abbreviated) {
        group[field] = value;
      }
    }

    if (state === 'group' || state === 'content') {
      throw new ParseError('blame output ended inside a group', lines.length);
    }

    return records;
  }
}

function isHeader(tokens: string[]): boolean {
  const [hash, ...numbers] = tokens;
  return HASH.test(hash) && numbers.every(n => LINE_NO.test(n));
}
