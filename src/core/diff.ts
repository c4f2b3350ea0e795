/**
 * Diff algorithm implementation
 * Uses a longest common subsequence table to compute the edit script
 */

export interface DiffLine {
  type: 'add' | 'remove' | 'context';
  content: string;
  oldLineNum?: number;
  newLineNum?: number;
}

export interface DiffHunk {
  oldStart: number;
  oldCount: number;
  newStart: number;
  newCount: number;
  lines: DiffLine[];
}

export interface LineDiffOptions {
  /** Treat runs of whitespace as equal and ignore trailing whitespace (git diff -b) */
  ignoreWhitespaceChange?: boolean;
}

/**
 * Split text into lines, dropping the empty line a trailing newline produces
 */
export function splitLines(text: string): string[] {
  if (text === '') return [];
  const lines = text.split('\n');
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

function normalizeWhitespace(line: string): string {
  return line.replace(/\s+/g, ' ').replace(/ $/, '');
}

/**
 * Compute the diff between two strings
 */
export function diff(oldText: string, newText: string, options: LineDiffOptions = {}): DiffLine[] {
  const oldLines = splitLines(oldText);
  const newLines = splitLines(newText);

  const key = options.ignoreWhitespaceChange ? normalizeWhitespace : (line: string) => line;
  const oldKeys = oldLines.map(key);
  const newKeys = newLines.map(key);

  const lcs = computeLCS(oldKeys, newKeys);
  return buildDiffFromLCS(oldLines, newLines, oldKeys, newKeys, lcs);
}

/**
 * Compute Longest Common Subsequence
 */
function computeLCS(a: string[], b: string[]): number[][] {
  const m = a.length;
  const n = b.length;
  const dp: number[][] = Array.from({ length: m + 1 }, () => new Array<number>(n + 1).fill(0));

  for (let i = 1; i <= m; i++) {
    for (let j = 1; j <= n; j++) {
      if (a[i - 1] === b[j - 1]) {
        dp[i][j] = dp[i - 1][j - 1] + 1;
      } else {
        dp[i][j] = Math.max(dp[i - 1][j], dp[i][j - 1]);
      }
    }
  }

  return dp;
}

/**
 * Build diff from LCS table
 */
function buildDiffFromLCS(
  oldLines: string[],
  newLines: string[],
  oldKeys: string[],
  newKeys: string[],
  dp: number[][]
): DiffLine[] {
  const changes: DiffLine[] = [];
  let i = oldLines.length;
  let j = newLines.length;

  while (i > 0 || j > 0) {
    if (i > 0 && j > 0 && oldKeys[i - 1] === newKeys[j - 1]) {
      changes.push({
        type: 'context',
        content: newLines[j - 1],
        oldLineNum: i,
        newLineNum: j,
      });
      i--;
      j--;
    } else if (j > 0 && (i === 0 || dp[i][j - 1] >= dp[i - 1][j])) {
      changes.push({
        type: 'add',
        content: newLines[j - 1],
        newLineNum: j,
      });
      j--;
    } else {
      changes.push({
        type: 'remove',
        content: oldLines[i - 1],
        oldLineNum: i,
      });
      i--;
    }
  }

  return changes.reverse();
}

/**
 * Create unified diff hunks with context.
 * Changes whose context windows touch are merged into one hunk.
 */
export function createHunks(lines: DiffLine[], contextLines: number = 3): DiffHunk[] {
  const ranges: Array<{ start: number; end: number }> = [];

  for (let i = 0; i < lines.length; i++) {
    if (lines[i].type === 'context') continue;

    const start = Math.max(0, i - contextLines);
    const end = Math.min(lines.length - 1, i + contextLines);
    const last = ranges[ranges.length - 1];

    if (last && start <= last.end + 1) {
      last.end = end;
    } else {
      ranges.push({ start, end });
    }
  }

  // Lines of each side consumed before index i
  const oldBefore: number[] = [];
  const newBefore: number[] = [];
  let oldSeen = 0;
  let newSeen = 0;
  for (const line of lines) {
    oldBefore.push(oldSeen);
    newBefore.push(newSeen);
    if (line.type !== 'add') oldSeen++;
    if (line.type !== 'remove') newSeen++;
  }

  return ranges.map(({ start, end }) => {
    const hunkLines = lines.slice(start, end + 1);
    const oldCount = hunkLines.filter(l => l.type !== 'add').length;
    const newCount = hunkLines.filter(l => l.type !== 'remove').length;

    return {
      oldStart: oldCount > 0 ? oldBefore[start] + 1 : oldBefore[start],
      oldCount,
      newStart: newCount > 0 ? newBefore[start] + 1 : newBefore[start],
      newCount,
      lines: hunkLines,
    };
  });
}

/**
 * Check if content appears to be binary
 */
export function isBinary(content: Buffer): boolean {
  // Check for null bytes in the first 8000 bytes
  const checkLength = Math.min(content.length, 8000);
  for (let i = 0; i < checkLength; i++) {
    if (content[i] === 0) {
      return true;
    }
  }
  return false;
}
