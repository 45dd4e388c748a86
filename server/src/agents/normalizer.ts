/**
 * Output Normalizer turns whatever the copywriting model produced into a
 * strict, frozen list of posts.
 *
 * Tolerated shapes, in the order they are handled:
 *   - an array of post-like objects (fields coerced one by one)
 *   - an object wrapping the array under `posts`, `final_posts` or `data`,
 *     or a single post-like object
 *   - text holding JSON that may need repair (trailing commas, single
 *     quotes, unquoted keys, True/False/None, a truncated tail), or a JSON
 *     string that itself holds JSON. Fenced blocks anywhere in the text are
 *     tried first, then the whole text, then each balanced bracket span, so
 *     prose around the payload may contain brackets of its own
 *
 * Candidates with neither a caption nor an image_url are dropped. Input order
 * is kept.
 */

import { NormalizationError } from '../lib/errors.js';
import { extractFencedBlocks, findBalancedSpans, repairJSON, stripCodeFence } from '../lib/json-repair.js';
import type { Post } from './types.js';

export const MAX_HASHTAGS = 5;

const WRAPPER_KEYS = ['posts', 'final_posts', 'data'] as const;
const IMAGE_URL_KEYS = ['image_url', 'imageUrl', 'image', 'url'] as const;
const CAPTION_KEYS = ['caption', 'text'] as const;
const HASHTAG_KEYS = ['hashtags', 'tags', 'hash_tags'] as const;

const MAX_UNWRAP_DEPTH = 4;

const HASHTAG_SPLIT = /[\s,;]+|(?=#)/u;
const NON_TAG_CHARS = /[^\p{L}\p{N}_]/gu;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function firstString(record: Record<string, unknown>, keys: readonly string[]): string | undefined {
  for (const key of keys) {
    const value = record[key];
    if (typeof value === 'string' && value.trim()) return value.trim();
  }
  return undefined;
}

function firstDefined(record: Record<string, unknown>, keys: readonly string[]): unknown {
  for (const key of keys) {
    if (record[key] !== undefined && record[key] !== null) return record[key];
  }
  return undefined;
}

function looksLikePost(record: Record<string, unknown>): boolean {
  return firstString(record, IMAGE_URL_KEYS) !== undefined || firstString(record, CAPTION_KEYS) !== undefined;
}

function hasPostLike(candidates: unknown[]): boolean {
  return candidates.some((candidate) => isRecord(candidate) && looksLikePost(candidate));
}

function parseText(text: string, depth: number): unknown[] | null {
  if (!text) return null;
  const repaired = repairJSON(text);
  return repaired.ok ? toCandidates(repaired.value, depth + 1) : null;
}

/**
 * First source holding a post-like item wins. When none does, the first
 * parseable source is returned so the caller can say why it was rejected.
 */
function candidatesFromText(raw: string, depth: number): unknown[] | null {
  const text = stripCodeFence(raw);
  let fallback: unknown[] | null = null;

  for (const source of [...extractFencedBlocks(raw), text]) {
    const candidates = parseText(source, depth);
    if (candidates && hasPostLike(candidates)) return candidates;
    fallback ??= candidates;
  }
  for (const span of findBalancedSpans(text)) {
    const candidates = parseText(span, depth);
    if (candidates && hasPostLike(candidates)) return candidates;
    fallback ??= candidates;
  }
  return fallback;
}

/** Reduce `raw` to a list of post candidates, or null when nothing structured is recoverable. */
function toCandidates(raw: unknown, depth: number): unknown[] | null {
  if (depth > MAX_UNWRAP_DEPTH) return null;

  if (typeof raw === 'string') return candidatesFromText(raw, depth);

  if (Array.isArray(raw)) return raw;

  if (isRecord(raw)) {
    for (const key of WRAPPER_KEYS) {
      const inner = raw[key];
      if (Array.isArray(inner) || typeof inner === 'string' || isRecord(inner)) {
        const unwrapped = toCandidates(inner, depth + 1);
        if (unwrapped) return unwrapped;
      }
    }
    if (looksLikePost(raw)) return [raw];
  }

  return null;
}

/**
 * Coerce any hashtag field into `#tag` strings: a delimited string is split on
 * whitespace, commas, semicolons and `#`; array items count as one tag each.
 */
export function coerceHashtags(value: unknown): string[] {
  let pieces: string[];
  if (typeof value === 'string') {
    pieces = value.split(HASHTAG_SPLIT);
  } else if (Array.isArray(value)) {
    pieces = value.filter((item): item is string => typeof item === 'string');
  } else {
    return [];
  }

  const tags: string[] = [];
  const seen = new Set<string>();
  for (const piece of pieces) {
    const body = piece.replace(NON_TAG_CHARS, '');
    if (!body) continue;
    const key = body.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    tags.push(`#${body}`);
    if (tags.length >= MAX_HASHTAGS) break;
  }
  return tags;
}

function coercePost(candidate: unknown): Post | null {
  if (!isRecord(candidate)) return null;
  const imageUrl = firstString(candidate, IMAGE_URL_KEYS);
  const caption = firstString(candidate, CAPTION_KEYS);
  if (imageUrl === undefined && caption === undefined) return null;

  return Object.freeze({
    image_url: imageUrl ?? '',
    caption: caption ?? '',
    hashtags: Object.freeze(coerceHashtags(firstDefined(candidate, HASHTAG_KEYS))),
  });
}

export function normalizePosts(raw: unknown): Post[] {
  const candidates = toCandidates(raw, 0);
  if (!candidates) {
    throw new NormalizationError('Copywriting output contains no recoverable post data');
  }

  const posts: Post[] = [];
  for (const candidate of candidates) {
    const post = coercePost(candidate);
    if (post) posts.push(post);
  }

  if (posts.length === 0) {
    throw new NormalizationError(`None of the ${candidates.length} post candidates had a caption or image_url`);
  }
  return posts;
}
