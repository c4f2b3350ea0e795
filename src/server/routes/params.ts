/**
 * Request params for the merge request routes.
 *
 * Forms and query strings use bracket keys (`merge_request[source_branch]`);
 * they are nested into plain objects and then validated with zod, the same
 * way JSON bodies are.
 */

import type { Context } from 'hono';
import { z } from 'zod';
import { pipelineStatusEnum } from '../../db/schema';

export interface ParamTree {
  [key: string]: string | ParamTree;
}

const KEY_PATTERN = /^([^[\]]+)((?:\[[^[\]]*\])*)$/;

// Keys that would reach Object.prototype when assigned
const UNSAFE_KEYS = new Set(['__proto__', 'constructor', 'prototype']);

function isSafeKey(key: string): boolean {
  return !UNSAFE_KEYS.has(key);
}

function emptyTree(): ParamTree {
  return Object.create(null);
}

function assign(tree: ParamTree, path: string[], value: string): void {
  const [head, ...rest] = path;
  if (head === undefined) return;

  if (rest.length === 0) {
    tree[head] = value;
    return;
  }

  const existing = tree[head];
  const child: ParamTree = typeof existing === 'object' ? existing : emptyTree();
  tree[head] = child;
  assign(child, rest, value);
}

/**
 * Nest bracket keys: `a[b][c]=1` becomes `{ a: { b: { c: '1' } } }`
 */
export function nestParams(entries: Iterable<[string, string]>): ParamTree {
  const tree = emptyTree();

  for (const [key, value] of entries) {
    const match = KEY_PATTERN.exec(key);
    if (!match?.[1]) continue;

    const segments = [...(match[2] ?? '').matchAll(/\[([^[\]]*)\]/g)].map((m) => m[1] ?? '');
    // `a[]` style array keys keep the last value
    const path = [match[1], ...segments.filter((s) => s !== '')];
    if (!path.every(isSafeKey)) continue;

    assign(tree, path, value);
  }

  return tree;
}

/**
 * Bring a JSON body into the same shape as form params.
 * Numbers and booleans become strings; null and arrays are dropped.
 */
export function normalizeJson(value: unknown): ParamTree {
  const tree = emptyTree();
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return tree;

  for (const [key, entry] of Object.entries(value)) {
    if (!isSafeKey(key)) continue;
    if (typeof entry === 'string') {
      tree[key] = entry;
    } else if (typeof entry === 'number' || typeof entry === 'boolean') {
      tree[key] = String(entry);
    } else if (typeof entry === 'object' && entry !== null && !Array.isArray(entry)) {
      tree[key] = normalizeJson(entry);
    }
  }

  return tree;
}

function merge(target: ParamTree, source: ParamTree): ParamTree {
  for (const [key, value] of Object.entries(source)) {
    if (!isSafeKey(key)) continue;
    const existing = target[key];
    if (typeof value === 'object' && typeof existing === 'object') {
      merge(existing, value);
    } else {
      target[key] = value;
    }
  }
  return target;
}

/**
 * Query params merged with the request body (form or JSON); body wins
 */
export async function readParams(c: Context): Promise<ParamTree> {
  const params = nestParams(new URL(c.req.url).searchParams.entries());

  if (c.req.method === 'GET' || c.req.method === 'HEAD') {
    return params;
  }

  const contentType = c.req.header('Content-Type') ?? '';

  if (contentType.includes('application/json')) {
    const body: unknown = await c.req.json();
    return merge(params, normalizeJson(body));
  }

  if (contentType.includes('application/x-www-form-urlencoded') || contentType.includes('multipart/form-data')) {
    const body = await c.req.parseBody();
    const entries: [string, string][] = [];
    for (const [key, value] of Object.entries(body)) {
      if (typeof value === 'string') entries.push([key, value]);
    }
    return merge(params, nestParams(entries));
  }

  return params;
}

/**
 * A value counts as given when it is a non-blank string
 */
export function isPresent(value: string | undefined): value is string {
  return value !== undefined && value.trim() !== '';
}

export function isTruthy(value: string | undefined): boolean {
  return isPresent(value) && !['0', 'false', 'off', 'no'].includes(value.trim().toLowerCase());
}

const optionalString = z.string().optional();

export const mergeRequestFormSchema = z.object({
  source_project_id: optionalString,
  source_project: optionalString,
  target_project_id: optionalString,
  target_project: optionalString,
  source_branch: optionalString,
  target_branch: optionalString,
  title: optionalString,
  description: optionalString,
  state_event: z.enum(['close', 'reopen']).optional(),
});

export type MergeRequestForm = z.infer<typeof mergeRequestFormSchema>;

const formContainer = z.object({
  merge_request: mergeRequestFormSchema.default({}),
});

export function mergeRequestForm(params: ParamTree): MergeRequestForm {
  return formContainer.parse(params).merge_request;
}

export const indexQuerySchema = z.object({
  state: z.enum(['opened', 'closed', 'merged', 'all']).catch('opened'),
  page: z.coerce.number().int().min(1).catch(1),
});

export const diffsQuerySchema = z.object({
  w: optionalString,
  view: z.enum(['inline', 'parallel']).optional().catch(undefined),
});

export const diffForPathQuerySchema = z.object({
  old_path: optionalString,
  new_path: optionalString,
  w: optionalString,
  view: z.enum(['inline', 'parallel']).optional().catch(undefined),
});

export const mergeActionSchema = z.object({
  sha: optionalString,
  commit_message: optionalString,
  should_remove_source_branch: optionalString,
  merge_when_build_succeeds: optionalString,
});

export const pipelineStatusSchema = z.object({
  status: z.enum(pipelineStatusEnum.enumValues),
});
