/**
 * Tests for request params and proxy send-data headers
 */

import { describe, it, expect } from 'vitest';
import { Hono } from 'hono';
import {
  indexQuerySchema,
  isTruthy,
  mergeRequestForm,
  nestParams,
  normalizeJson,
  readParams,
} from '../routes/params';
import { decodeSendData, sendGitDiff, sendGitPatch, SEND_DATA_HEADER } from '../workhorse';

describe('params', () => {
  describe('nestParams', () => {
    it('should nest bracket keys', () => {
      expect(
        nestParams([
          ['merge_request[source_branch]', 'feature'],
          ['merge_request[target_branch]', 'master'],
          ['view', 'parallel'],
        ])
      ).toEqual({
        merge_request: { source_branch: 'feature', target_branch: 'master' },
        view: 'parallel',
      });
    });

    it('should skip malformed keys', () => {
      expect(nestParams([['[oops]', 'x'], ['a[b', 'y']])).toEqual({});
    });

    it('should skip keys that reach the object prototype', () => {
      const params = nestParams([
        ['__proto__[merge_when_build_succeeds]', '1'],
        ['merge_request[constructor][prototype]', '1'],
        ['prototype', '1'],
        ['view', 'inline'],
      ]);

      expect(params).toEqual({ view: 'inline' });
      expect(Object.prototype).not.toHaveProperty('merge_when_build_succeeds');
      expect(Object.getPrototypeOf(params)).toBeNull();
    });
  });

  describe('normalizeJson', () => {
    it('should turn scalars into strings and drop the rest', () => {
      expect(
        normalizeJson({ sha: 'abc', merge_when_build_succeeds: true, page: 2, list: [1], none: null, nested: { a: 1 } })
      ).toEqual({ sha: 'abc', merge_when_build_succeeds: 'true', page: '2', nested: { a: '1' } });
    });
  });

  describe('isTruthy', () => {
    it('should treat common false spellings as false', () => {
      expect(['1', 'true', 'on'].map(isTruthy)).toEqual([true, true, true]);
      expect(['0', 'false', 'off', 'no', '', undefined].map(isTruthy)).toEqual([false, false, false, false, false, false]);
    });
  });

  describe('schemas', () => {
    it('should fall back to the opened filter and the first page', () => {
      expect(indexQuerySchema.parse({ state: 'bogus', page: '-3' })).toEqual({ state: 'opened', page: 1 });
      expect(indexQuerySchema.parse({ state: 'merged', page: '2' })).toEqual({ state: 'merged', page: 2 });
    });

    it('should read the merge request form', () => {
      expect(mergeRequestForm({ merge_request: { source_branch: 'feature', state_event: 'close' } })).toEqual({
        source_branch: 'feature',
        state_event: 'close',
      });
      expect(mergeRequestForm({})).toEqual({});
    });
  });

  describe('readParams', () => {
    const app = new Hono();
    app.all('/params', async (c) => c.json(await readParams(c)));

    it('should merge the query with a form body', async () => {
      const res = await app.request('/params?view=inline&merge_request[title]=Query', {
        method: 'POST',
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        body: 'merge_request%5Btitle%5D=Body&merge_request%5Bsource_branch%5D=feature',
      });

      expect(await res.json()).toEqual({
        view: 'inline',
        merge_request: { title: 'Body', source_branch: 'feature' },
      });
    });

    it('should read JSON bodies', async () => {
      const res = await app.request('/params', {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ sha: 'abc', merge_when_build_succeeds: true }),
      });

      expect(await res.json()).toEqual({ sha: 'abc', merge_when_build_succeeds: 'true' });
    });

    it('should drop prototype keys from JSON bodies', async () => {
      const res = await app.request('/params', {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: '{"__proto__":{"sha":"abc"},"merge_request":{"constructor":{"title":"x"},"title":"Body"}}',
      });

      expect(await res.json()).toEqual({ merge_request: { title: 'Body' } });
      expect(Object.prototype).not.toHaveProperty('sha');
    });

    it('should only read the query of GET requests', async () => {
      const res = await app.request('/params?w=1');
      expect(await res.json()).toEqual({ w: '1' });
    });
  });
});

describe('workhorse', () => {
  const params = { RepoPath: 'acme/app.git', ShaFrom: 'a'.repeat(40), ShaTo: 'b'.repeat(40) };

  it('should encode a git diff instruction', () => {
    const [header, value] = sendGitDiff(params);

    expect(header).toBe(SEND_DATA_HEADER);
    expect(value.startsWith('git-diff:')).toBe(true);
    expect(decodeSendData(value)).toEqual({ command: 'git-diff', params });
  });

  it('should encode a git format-patch instruction', () => {
    const [, value] = sendGitPatch(params);
    expect(decodeSendData(value)).toEqual({ command: 'git-format-patch', params });
  });
});
