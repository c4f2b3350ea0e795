/**
 * Diff partials: the list of changed files and a single file, inline or
 * side by side.
 */

import { html } from 'hono/html';
import type { DiffFile } from '../../core/compare';
import type { DiffHunk, DiffLine } from '../../core/diff';
import type { Html } from './layout';

export type DiffView = 'inline' | 'parallel';

export interface DiffNotesOptions {
  /** Comments cannot be left on diffs of unsaved merge requests */
  disabled: boolean;
  noteableType?: string;
  noteableId?: string;
}

export interface DiffFileOptions {
  view: DiffView;
  notes: DiffNotesOptions;
}

function hunkHeader(hunk: DiffHunk): string {
  return `@@ -${hunk.oldStart},${hunk.oldCount} +${hunk.newStart},${hunk.newCount} @@`;
}

function lineClass(line: DiffLine): string {
  if (line.type === 'add') return 'new';
  if (line.type === 'remove') return 'old';
  return '';
}

function linePrefix(line: DiffLine): string {
  if (line.type === 'add') return '+';
  if (line.type === 'remove') return '-';
  return ' ';
}

function inlineTable(file: DiffFile): Html {
  return html`<table class="code text-file inline">
${file.hunks.map(
  (hunk) => html`<tr class="line_holder match">
  <td class="diff-line-num unfold">...</td>
  <td class="diff-line-num unfold">...</td>
  <td class="line_content match">${hunkHeader(hunk)}</td>
</tr>
${hunk.lines.map(
  (line) => html`<tr class="line_holder ${lineClass(line)}">
  <td class="diff-line-num old_line">${line.type === 'add' ? '' : line.oldLineNum}</td>
  <td class="diff-line-num new_line">${line.type === 'remove' ? '' : line.newLineNum}</td>
  <td class="line_content ${lineClass(line)}">${linePrefix(line)}${line.content}</td>
</tr>`
)}`
)}
</table>`;
}

interface ParallelRow {
  left: DiffLine | null;
  right: DiffLine | null;
}

/**
 * Pair removed lines with the added lines that replace them
 */
export function parallelRows(lines: DiffLine[]): ParallelRow[] {
  const rows: ParallelRow[] = [];
  let removed: DiffLine[] = [];
  let added: DiffLine[] = [];

  const flush = (): void => {
    const count = Math.max(removed.length, added.length);
    for (let i = 0; i < count; i++) {
      rows.push({ left: removed[i] ?? null, right: added[i] ?? null });
    }
    removed = [];
    added = [];
  };

  for (const line of lines) {
    if (line.type === 'remove') {
      if (added.length > 0) flush();
      removed.push(line);
    } else if (line.type === 'add') {
      added.push(line);
    } else {
      flush();
      rows.push({ left: line, right: line });
    }
  }
  flush();

  return rows;
}

function parallelSide(line: DiffLine | null, side: 'left' | 'right'): Html {
  if (!line) {
    return html`<td class="diff-line-num empty-cell"></td><td class="line_content parallel empty-cell"></td>`;
  }
  const number = side === 'left' ? line.oldLineNum : line.newLineNum;
  return html`<td class="diff-line-num ${side === 'left' ? 'old_line' : 'new_line'} ${lineClass(line)}">${number}</td><td class="line_content parallel ${lineClass(line)}">${line.content}</td>`;
}

function parallelTable(file: DiffFile): Html {
  return html`<table class="code text-file parallel">
${file.hunks.map(
  (hunk) => html`<tr class="line_holder parallel match">
  <td class="diff-line-num unfold">...</td>
  <td class="line_content parallel match">${hunkHeader(hunk)}</td>
  <td class="diff-line-num unfold">...</td>
  <td class="line_content parallel match">${hunkHeader(hunk)}</td>
</tr>
${parallelRows(hunk.lines).map(
  (row) => html`<tr class="line_holder parallel">
  ${parallelSide(row.left, 'left')}
  ${parallelSide(row.right, 'right')}
</tr>`
)}`
)}
</table>`;
}

function fileTitle(file: DiffFile): Html {
  const labels: string[] = [];
  if (file.newFile) labels.push('new file');
  if (file.deletedFile) labels.push('deleted');
  if (file.submodule) labels.push('submodule');
  if (!file.newFile && !file.deletedFile && file.aMode !== file.bMode) {
    labels.push(`mode changed ${file.aMode ?? ''} → ${file.bMode ?? ''}`);
  }

  return html`<div class="file-title">
  <span class="file-path">${file.renamedFile ? `${file.oldPath} → ${file.newPath}` : file.newPath}</span>
  ${labels.map((label) => html`<span class="file-mode">${label}</span>`)}
  <span class="file-stats">+${file.additions} -${file.deletions}</span>
</div>`;
}

function fileBody(file: DiffFile, view: DiffView): Html {
  if (file.binary) {
    return html`<div class="nothing-here-block">Binary file not shown</div>`;
  }
  if (file.hunks.length === 0) {
    return html`<div class="nothing-here-block">No changes to the file content</div>`;
  }
  return view === 'parallel' ? parallelTable(file) : inlineTable(file);
}

export function diffFilePartial(file: DiffFile, options: DiffFileOptions): Html {
  const { notes } = options;
  return html`<div class="diff-file" data-old-path="${file.oldPath}" data-new-path="${file.newPath}" data-diff-notes-disabled="${String(notes.disabled)}"${
    notes.noteableType && notes.noteableId
      ? html` data-noteable-type="${notes.noteableType}" data-noteable-id="${notes.noteableId}"`
      : ''
  }>
${fileTitle(file)}
${fileBody(file, options.view)}
</div>`;
}

export function diffsPartial(files: DiffFile[], options: DiffFileOptions): Html {
  const additions = files.reduce((sum, f) => sum + f.additions, 0);
  const deletions = files.reduce((sum, f) => sum + f.deletions, 0);

  return html`<div class="merge-request-diffs" data-view="${options.view}">
<div class="diff-stats">Showing ${files.length} changed ${files.length === 1 ? 'file' : 'files'} with ${additions} additions and ${deletions} deletions</div>
${files.map((file) => diffFilePartial(file, options))}
</div>`;
}
