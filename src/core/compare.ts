/**
 * Tree comparison
 *
 * Turns two flattened trees into the list of changed files a merge request
 * shows, with hunks computed by the line diff in ./diff.
 */

import { createHunks, diff, isBinary, type DiffHunk } from './diff';

export const SUBMODULE_MODE = '160000';

/**
 * A blob (or submodule link) in a flattened tree
 */
export interface TreeEntry {
  path: string;
  mode: string;
  sha: string;
}

export interface DiffFile {
  oldPath: string;
  newPath: string;
  aMode: string | null;
  bMode: string | null;
  newFile: boolean;
  deletedFile: boolean;
  renamedFile: boolean;
  submodule: boolean;
  binary: boolean;
  hunks: DiffHunk[];
  additions: number;
  deletions: number;
}

export type BlobReader = (sha: string) => Promise<Buffer>;

export interface CompareOptions {
  ignoreWhitespaceChange?: boolean;
  /** Only return files whose old or new path is listed */
  paths?: string[];
  contextLines?: number;
}

interface FilePair {
  before: TreeEntry | null;
  after: TreeEntry | null;
}

async function readContent(entry: TreeEntry | null, readBlob: BlobReader): Promise<Buffer> {
  if (!entry) return Buffer.alloc(0);
  if (entry.mode === SUBMODULE_MODE) {
    return Buffer.from(`Subproject commit ${entry.sha}\n`);
  }
  return readBlob(entry.sha);
}

/**
 * Pair up entries of both trees, detecting exact renames
 */
function pairEntries(base: TreeEntry[], head: TreeEntry[]): FilePair[] {
  const baseMap = new Map(base.map(e => [e.path, e]));
  const headMap = new Map(head.map(e => [e.path, e]));

  const pairs: FilePair[] = [];
  const deleted: TreeEntry[] = [];
  const added: TreeEntry[] = [];

  for (const entry of base) {
    const other = headMap.get(entry.path);
    if (!other) {
      deleted.push(entry);
    } else if (other.sha !== entry.sha || other.mode !== entry.mode) {
      pairs.push({ before: entry, after: other });
    }
  }

  for (const entry of head) {
    if (!baseMap.has(entry.path)) {
      added.push(entry);
    }
  }

  for (const gone of deleted) {
    const index = added.findIndex(
      e => e.sha === gone.sha && e.mode === gone.mode && gone.mode !== SUBMODULE_MODE
    );
    if (index === -1) {
      pairs.push({ before: gone, after: null });
    } else {
      pairs.push({ before: gone, after: added[index] });
      added.splice(index, 1);
    }
  }

  for (const entry of added) {
    pairs.push({ before: null, after: entry });
  }

  const pathOf = (pair: FilePair): string => (pair.after ?? pair.before)?.path ?? '';
  return pairs.sort((a, b) => (pathOf(a) < pathOf(b) ? -1 : pathOf(a) > pathOf(b) ? 1 : 0));
}

/**
 * Compare two flattened trees
 */
export async function compareTrees(
  base: TreeEntry[],
  head: TreeEntry[],
  readBlob: BlobReader,
  options: CompareOptions = {}
): Promise<DiffFile[]> {
  const { ignoreWhitespaceChange = false, paths, contextLines = 3 } = options;

  let pairs = pairEntries(base, head);
  if (paths) {
    const wanted = new Set(paths);
    pairs = pairs.filter(
      p => (p.before && wanted.has(p.before.path)) || (p.after && wanted.has(p.after.path))
    );
  }

  const files: DiffFile[] = [];

  for (const { before, after } of pairs) {
    const oldPath = (before ?? after)?.path ?? '';
    const newPath = (after ?? before)?.path ?? '';
    const renamedFile = before !== null && after !== null && before.path !== after.path;
    const modeChanged = before !== null && after !== null && before.mode !== after.mode;

    const oldContent = await readContent(before, readBlob);
    const newContent = await readContent(after, readBlob);
    const binary = isBinary(oldContent) || isBinary(newContent);

    const hunks = binary
      ? []
      : createHunks(
          diff(oldContent.toString('utf-8'), newContent.toString('utf-8'), { ignoreWhitespaceChange }),
          contextLines
        );

    const file: DiffFile = {
      oldPath,
      newPath,
      aMode: before?.mode ?? null,
      bMode: after?.mode ?? null,
      newFile: before === null,
      deletedFile: after === null,
      renamedFile,
      submodule: before?.mode === SUBMODULE_MODE || after?.mode === SUBMODULE_MODE,
      binary,
      hunks,
      additions: 0,
      deletions: 0,
    };

    for (const hunk of hunks) {
      for (const line of hunk.lines) {
        if (line.type === 'add') file.additions++;
        if (line.type === 'remove') file.deletions++;
      }
    }

    const onlyWhitespace =
      ignoreWhitespaceChange &&
      !binary &&
      hunks.length === 0 &&
      !file.newFile &&
      !file.deletedFile &&
      !renamedFile &&
      !modeChanged;

    if (!onlyWhitespace) {
      files.push(file);
    }
  }

  return files;
}
