/**
 * Tests for the line diff and the tree comparison built on it
 */

import { describe, it, expect } from 'vitest';
import { createHunks, diff, isBinary, splitLines } from '../core/diff';
import { compareTrees, SUBMODULE_MODE, type TreeEntry } from '../core/compare';

describe('diff', () => {
  describe('splitLines', () => {
    it('should drop the empty line after a trailing newline', () => {
      expect(splitLines('a\nb\n')).toEqual(['a', 'b']);
      expect(splitLines('a\nb')).toEqual(['a', 'b']);
      expect(splitLines('')).toEqual([]);
    });
  });

  describe('diff', () => {
    it('should mark unchanged lines as context', () => {
      const lines = diff('a\nb\n', 'a\nb\n');
      expect(lines.map((l) => l.type)).toEqual(['context', 'context']);
    });

    it('should put the removed line before the line replacing it', () => {
      const lines = diff('a\nb\nc\n', 'a\nB\nc\n');

      expect(lines).toEqual([
        { type: 'context', content: 'a', oldLineNum: 1, newLineNum: 1 },
        { type: 'remove', content: 'b', oldLineNum: 2 },
        { type: 'add', content: 'B', newLineNum: 2 },
        { type: 'context', content: 'c', oldLineNum: 3, newLineNum: 3 },
      ]);
    });

    it('should ignore whitespace changes when asked', () => {
      const lines = diff('if (a  &&  b) {\n', 'if (a && b) {  \n', { ignoreWhitespaceChange: true });
      expect(lines).toEqual([
        { type: 'context', content: 'if (a && b) {  ', oldLineNum: 1, newLineNum: 1 },
      ]);
    });

    it('should still see added whitespace inside a word', () => {
      const lines = diff('ab\n', 'a b\n', { ignoreWhitespaceChange: true });
      expect(lines.map((l) => l.type)).toEqual(['remove', 'add']);
    });
  });

  describe('createHunks', () => {
    it('should compute hunk ranges', () => {
      const [hunk] = createHunks(diff('a\nb\nc\n', 'a\nB\nc\n'));
      expect(hunk).toMatchObject({ oldStart: 1, oldCount: 3, newStart: 1, newCount: 3 });
    });

    it('should split changes whose context does not touch', () => {
      const before = Array.from({ length: 10 }, (_, i) => `l${i + 1}`).join('\n') + '\n';
      const after = before.replace('l1\n', 'X1\n').replace('l10\n', 'X10\n');

      const hunks = createHunks(diff(before, after), 1);

      expect(hunks).toHaveLength(2);
      expect(hunks[0]).toMatchObject({ oldStart: 1, oldCount: 2, newStart: 1, newCount: 2 });
      expect(hunks[1]).toMatchObject({ oldStart: 9, oldCount: 2, newStart: 9, newCount: 2 });
      expect(hunks[1]?.lines.map((l) => l.content)).toEqual(['l9', 'l10', 'X10']);
    });

    it('should return no hunks without changes', () => {
      expect(createHunks(diff('a\n', 'a\n'))).toEqual([]);
    });
  });

  describe('isBinary', () => {
    it('should detect null bytes', () => {
      expect(isBinary(Buffer.from([0x50, 0x00, 0x4b]))).toBe(true);
      expect(isBinary(Buffer.from('plain text'))).toBe(false);
    });
  });
});

describe('compareTrees', () => {
  const blobs = new Map<string, Buffer>([
    ['b1', Buffer.from('one\ntwo\n')],
    ['b2', Buffer.from('one\n2\n')],
    ['b3', Buffer.from('new file\n')],
    ['b4', Buffer.from('one  \ntwo\n')],
    ['bin', Buffer.from([0x89, 0x50, 0x00, 0x01])],
    ['bin2', Buffer.from([0x89, 0x50, 0x00, 0x02])],
  ]);
  const readBlob = async (sha: string): Promise<Buffer> => blobs.get(sha) ?? Buffer.alloc(0);
  const blob = (path: string, sha: string): TreeEntry => ({ path, sha, mode: '100644' });

  it('should report modified, added and deleted files sorted by path', async () => {
    const files = await compareTrees(
      [blob('b.txt', 'b1'), blob('gone.txt', 'b1')],
      [blob('b.txt', 'b2'), blob('a.txt', 'b3')],
      readBlob
    );

    expect(files.map((f) => [f.newPath, f.newFile, f.deletedFile])).toEqual([
      ['a.txt', true, false],
      ['b.txt', false, false],
      ['gone.txt', false, true],
    ]);
    expect(files[1]).toMatchObject({ additions: 1, deletions: 1 });
    expect(files[2]).toMatchObject({ additions: 0, deletions: 2, bMode: null });
  });

  it('should detect exact renames', async () => {
    const files = await compareTrees([blob('old.txt', 'b1')], [blob('new.txt', 'b1')], readBlob);

    expect(files).toHaveLength(1);
    expect(files[0]).toMatchObject({
      oldPath: 'old.txt',
      newPath: 'new.txt',
      renamedFile: true,
      hunks: [],
    });
  });

  it('should show submodule changes as commit lines', async () => {
    const oldSha = 'a'.repeat(40);
    const newSha = 'b'.repeat(40);

    const [file] = await compareTrees(
      [{ path: 'vendor/lib', mode: SUBMODULE_MODE, sha: oldSha }],
      [{ path: 'vendor/lib', mode: SUBMODULE_MODE, sha: newSha }],
      readBlob
    );

    expect(file?.submodule).toBe(true);
    expect(file?.hunks[0]?.lines.map((l) => `${l.type} ${l.content}`)).toEqual([
      `remove Subproject commit ${oldSha}`,
      `add Subproject commit ${newSha}`,
    ]);
  });

  it('should not diff binary files', async () => {
    const [file] = await compareTrees([blob('logo.png', 'bin')], [blob('logo.png', 'bin2')], readBlob);
    expect(file).toMatchObject({ binary: true, hunks: [], additions: 0, deletions: 0 });
  });

  it('should keep only the requested paths', async () => {
    const files = await compareTrees(
      [blob('b.txt', 'b1')],
      [blob('b.txt', 'b2'), blob('a.txt', 'b3')],
      readBlob,
      { paths: ['a.txt'] }
    );
    expect(files.map((f) => f.newPath)).toEqual(['a.txt']);
  });

  it('should omit files that only changed whitespace when ignoring whitespace', async () => {
    const base = [blob('b.txt', 'b1'), blob('c.txt', 'b1')];
    const head = [blob('b.txt', 'b4'), blob('c.txt', 'b2')];

    const all = await compareTrees(base, head, readBlob);
    const ignoring = await compareTrees(base, head, readBlob, { ignoreWhitespaceChange: true });

    expect(all.map((f) => f.newPath)).toEqual(['b.txt', 'c.txt']);
    expect(ignoring.map((f) => f.newPath)).toEqual(['c.txt']);
  });

  it('should keep mode changes even when ignoring whitespace', async () => {
    const files = await compareTrees(
      [blob('run.sh', 'b1')],
      [{ path: 'run.sh', sha: 'b1', mode: '100755' }],
      readBlob,
      { ignoreWhitespaceChange: true }
    );
    expect(files).toHaveLength(1);
    expect(files[0]).toMatchObject({ aMode: '100644', bMode: '100755', hunks: [] });
  });
});
