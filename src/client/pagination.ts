/**
 * Shaping of list responses: `{ results: [...], next: "<absolute url>" | null }`
 */

import { ClientError } from '../errors/index.js';
import { err, isRecord, ok, type Result } from '../types/common.js';

/**
 * The `results` array of a list response, if it has one
 */
export function extractResults(body: unknown): unknown[] | undefined {
  if (isRecord(body) && Array.isArray(body['results'])) {
    return body['results'];
  }
  return undefined;
}

/**
 * The `next` page link of a list response, if there is another page
 */
export function nextLink(body: unknown): string | undefined {
  if (!isRecord(body)) {
    return undefined;
  }
  const next = body['next'];
  return typeof next === 'string' && next.length > 0 ? next : undefined;
}

export function resultsOf(body: unknown, path: string): Result<unknown[]> {
  const results = extractResults(body);
  if (!results) {
    return err(new ClientError(`Response for ${path} has no results list`, { reason: 'invalid_response' }));
  }
  return ok(results);
}

export interface PageWalkOptions {
  /** Stop with an error after this many pages (default: 1000) */
  maxPages?: number;
}

/**
 * Follows `next` links from the first page, concatenating `results`.
 * A failed page fails the whole walk; nothing is silently truncated.
 */
export async function collectPages(
  fetchPage: (path: string, first: boolean) => Promise<Result<unknown>>,
  path: string,
  options: PageWalkOptions = {}
): Promise<Result<unknown[]>> {
  const maxPages = options.maxPages ?? 1000;
  const seen = new Set<string>();
  const collected: unknown[] = [];

  let current: string | undefined = path;
  let first = true;

  while (current !== undefined) {
    if (seen.size >= maxPages) {
      return err(new ClientError(`Pagination of ${path} exceeded ${maxPages} pages`, { reason: 'invalid_response' }));
    }
    seen.add(current);

    const page = await fetchPage(current, first);
    if (!page.ok) {
      return page;
    }

    const results = resultsOf(page.value, current);
    if (!results.ok) {
      return results;
    }
    collected.push(...results.value);

    const next = nextLink(page.value);
    if (next !== undefined && seen.has(next)) {
      return err(new ClientError(`Pagination of ${path} loops back to ${next}`, { reason: 'invalid_response' }));
    }
    current = next;
    first = false;
  }

  return ok(collected);
}
