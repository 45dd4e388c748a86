import logger from './logger.js';

export type RepairResult = { ok: true; value: unknown; step: RepairStep } | { ok: false };

export type RepairStep =
  | 'direct'
  | 'extracted'
  | 'trailing_commas'
  | 'quotes'
  | 'unquoted_keys'
  | 'keyword_literals'
  | 'closed_partial';

const MAX_AGGRESSIVE_REPAIR_SIZE = 50_000;

const MAX_SPAN_STARTS = 200;

const FENCED_BLOCK = /(```|~~~)[ \t]*[A-Za-z0-9_+-]*[ \t]*\r?\n?([\s\S]*?)\1/g;
const LEADING_FENCE = /^\s*(?:```|~~~)[ \t]*[A-Za-z0-9_+-]*[ \t]*\r?\n?/;
const TRAILING_FENCE = /\r?\n?[ \t]*(?:```|~~~)\s*$/;

/**
 * Remove surrounding code-fence markers (``` or ~~~) and the format tag that
 * follows the opening fence. Text without fences is returned trimmed.
 */
export function stripCodeFence(text: string): string {
  return text.replace(LEADING_FENCE, '').replace(TRAILING_FENCE, '').trim();
}

/** Contents of every fenced block in the text, wherever it sits, in order. */
export function extractFencedBlocks(text: string): string[] {
  return [...text.matchAll(FENCED_BLOCK)]
    .map((match) => match[2].trim())
    .filter((block) => block.length > 0);
}

/** Index of the closer that balances the opener at `start`, or -1. Brackets inside strings are skipped. */
function matchingClose(text: string, start: number): number {
  const stack: string[] = [];
  let inString = false;
  let escape = false;
  for (let i = start; i < text.length; i += 1) {
    const ch = text[i];
    if (inString) {
      if (escape) escape = false;
      else if (ch === '\\') escape = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === '{') stack.push('}');
    else if (ch === '[') stack.push(']');
    else if (ch === '}' || ch === ']') {
      if (stack.pop() !== ch) return -1;
      if (stack.length === 0) return i;
    }
  }
  return -1;
}

/**
 * Every balanced `{...}` or `[...]` span, ordered by where it starts. Outer
 * spans come before the spans nested in them.
 */
export function findBalancedSpans(text: string): string[] {
  const spans: string[] = [];
  let starts = 0;
  for (let i = 0; i < text.length && starts < MAX_SPAN_STARTS; i += 1) {
    const ch = text[i];
    if (ch !== '{' && ch !== '[') continue;
    starts += 1;
    const end = matchingClose(text, i);
    if (end > i) spans.push(text.slice(i, end + 1));
  }
  return spans;
}

function tryParse(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

/**
 * Slice from the first `{` or `[` to the matching last closer, dropping any
 * prose the model wrapped around the payload.
 */
function extractPayload(text: string): string {
  const firstBrace = text.indexOf('{');
  const firstBracket = text.indexOf('[');
  let start = -1;
  let closeChar = '';

  if (firstBrace >= 0 && (firstBracket < 0 || firstBrace < firstBracket)) {
    start = firstBrace;
    closeChar = '}';
  } else if (firstBracket >= 0) {
    start = firstBracket;
    closeChar = ']';
  }

  if (start < 0) return text;
  const lastClose = text.lastIndexOf(closeChar);
  return lastClose > start ? text.slice(start, lastClose + 1) : text.slice(start);
}

/** Replace bare True/False/None tokens that sit outside string literals. */
function replaceKeywordLiterals(text: string): string {
  let out = '';
  let inString = false;
  let escape = false;
  let i = 0;
  while (i < text.length) {
    const ch = text[i];
    if (inString) {
      out += ch;
      if (escape) escape = false;
      else if (ch === '\\') escape = true;
      else if (ch === '"') inString = false;
      i += 1;
      continue;
    }
    if (ch === '"') {
      inString = true;
      out += ch;
      i += 1;
      continue;
    }
    const rest = text.slice(i);
    const literal = /^(True|False|None)\b/.exec(rest);
    const prev = i > 0 ? text[i - 1] : '';
    if (literal && !/[A-Za-z0-9_]/.test(prev)) {
      out += literal[1] === 'True' ? 'true' : literal[1] === 'False' ? 'false' : 'null';
      i += literal[1].length;
      continue;
    }
    out += ch;
    i += 1;
  }
  return out;
}

/** Append the closers a truncated payload is missing. */
function closePartial(s: string): string {
  const stack: string[] = [];
  let inString = false;
  let escape = false;
  for (const ch of s) {
    if (escape) { escape = false; continue; }
    if (ch === '\\' && inString) { escape = true; continue; }
    if (ch === '"') { inString = !inString; continue; }
    if (inString) continue;
    if (ch === '{') stack.push('}');
    else if (ch === '[') stack.push(']');
    else if (ch === '}' || ch === ']') stack.pop();
  }
  const base = inString ? `${s}"` : s;
  return base.replace(/,\s*$/, '') + stack.reverse().join('');
}

/**
 * Multi-step JSON repair for model output that may include code fences,
 * surrounding prose, trailing commas, single quotes, unquoted keys,
 * capitalized True/False/None keywords or a truncated tail.
 */
export function repairJSON(text: string): RepairResult {
  if (!text || typeof text !== 'string') return { ok: false };

  const unfenced = stripCodeFence(text);
  const direct = tryParse(unfenced);
  if (direct.ok) return { ...direct, step: 'direct' };

  const extracted = extractPayload(unfenced);
  const fromExtract = tryParse(extracted);
  if (fromExtract.ok) return { ...fromExtract, step: 'extracted' };

  const noTrailing = extracted.replace(/,\s*([\]}])/g, '$1');
  const fromTrailing = tryParse(noTrailing);
  if (fromTrailing.ok) return { ...fromTrailing, step: 'trailing_commas' };

  // Skip regex-heavy steps on large inputs to avoid catastrophic backtracking
  if (noTrailing.length > MAX_AGGRESSIVE_REPAIR_SIZE) {
    logger.warn({ size: noTrailing.length }, 'Skipping aggressive JSON repair on large input');
    return { ok: false };
  }

  const quoted = noTrailing
    .replace(/(?<=:\s*"[^"]*)\n/g, '\\n')
    .replace(/(?<=:\s*"[^"]*)\t/g, '\\t')
    .replace(/(?<=[[{,:])\s*'((?:[^'\\]|\\.)*)'\s*(?=[,\]}:])/g, (_m, inner: string) => JSON.stringify(inner.replace(/\\'/g, "'")));
  const fromQuotes = tryParse(quoted);
  if (fromQuotes.ok) return { ...fromQuotes, step: 'quotes' };

  const quotedKeys = quoted.replace(/([{,]\s*)([A-Za-z_$][A-Za-z0-9_$]*)\s*:/g, '$1"$2":');
  const fromKeys = tryParse(quotedKeys);
  if (fromKeys.ok) return { ...fromKeys, step: 'unquoted_keys' };

  const keywords = replaceKeywordLiterals(quotedKeys);
  const fromKeywords = tryParse(keywords);
  if (fromKeywords.ok) return { ...fromKeywords, step: 'keyword_literals' };

  const closed = closePartial(keywords);
  if (closed !== keywords) {
    const fromClosed = tryParse(closed);
    if (fromClosed.ok) return { ...fromClosed, step: 'closed_partial' };
  }

  logger.warn({ rawSnippet: text.substring(0, 300) }, 'Failed to repair JSON');
  return { ok: false };
}
