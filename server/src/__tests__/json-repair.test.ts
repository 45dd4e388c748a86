import { describe, it, expect } from 'vitest';
import { extractFencedBlocks, findBalancedSpans, repairJSON, stripCodeFence } from '../lib/json-repair.js';

describe('stripCodeFence', () => {
  it('removes backtick fences and their format tag', () => {
    expect(stripCodeFence('```json\n[{"a": 1}]\n```')).toBe('[{"a": 1}]');
  });

  it('removes tilde fences', () => {
    expect(stripCodeFence('~~~JSON\n{"a": 1}\n~~~\n')).toBe('{"a": 1}');
  });

  it('is idempotent', () => {
    const once = stripCodeFence('```\n[1, 2]\n```');
    expect(stripCodeFence(once)).toBe(once);
    expect(once).toBe('[1, 2]');
  });

  it('trims text without fences', () => {
    expect(stripCodeFence('  [1]  ')).toBe('[1]');
  });
});

describe('repairJSON', () => {
  it('parses valid JSON without modification', () => {
    expect(repairJSON('{"key": "value", "count": 42}')).toEqual({
      ok: true,
      value: { key: 'value', count: 42 },
      step: 'direct',
    });
  });

  it('strips markdown json fences before parsing', () => {
    expect(repairJSON('```json\n{"answer": true}\n```')).toEqual({
      ok: true,
      value: { answer: true },
      step: 'direct',
    });
  });

  it('extracts the payload from surrounding prose', () => {
    expect(repairJSON('Here you go: [{"a": 1}] hope it helps')).toEqual({
      ok: true,
      value: [{ a: 1 }],
      step: 'extracted',
    });
  });

  it('repairs trailing commas', () => {
    expect(repairJSON('{"key": "value",}')).toMatchObject({ ok: true, value: { key: 'value' }, step: 'trailing_commas' });
    expect(repairJSON('["a", "b", "c",]')).toMatchObject({ ok: true, value: ['a', 'b', 'c'] });
  });

  it('converts single-quoted strings', () => {
    expect(repairJSON("{'caption': 'Sunny pool'}")).toEqual({
      ok: true,
      value: { caption: 'Sunny pool' },
      step: 'quotes',
    });
  });

  it('quotes bare object keys', () => {
    expect(repairJSON('{caption: "Pool", hashtags: ["#a"]}')).toEqual({
      ok: true,
      value: { caption: 'Pool', hashtags: ['#a'] },
      step: 'unquoted_keys',
    });
  });

  it('maps True/False/None outside strings', () => {
    expect(repairJSON('{"ok": True, "missing": None, "note": "None of it"}')).toEqual({
      ok: true,
      value: { ok: true, missing: null, note: 'None of it' },
      step: 'keyword_literals',
    });
  });

  it('closes a truncated payload', () => {
    expect(repairJSON('[{"caption": "Pool", "hashtags": ["#sun", "#sea"')).toEqual({
      ok: true,
      value: [{ caption: 'Pool', hashtags: ['#sun', '#sea'] }],
      step: 'closed_partial',
    });
  });

  it('gives up on large inputs that need aggressive repair', () => {
    expect(repairJSON('{' + 'x'.repeat(60_000))).toEqual({ ok: false });
  });

  it('fails on text with no JSON in it', () => {
    expect(repairJSON('this is just plain text with no JSON')).toEqual({ ok: false });
    expect(repairJSON('')).toEqual({ ok: false });
  });
});

describe('extractFencedBlocks', () => {
  it('returns every fenced block wherever it appears', () => {
    const text = 'Intro\n```json\n[1]\n```\nmiddle\n~~~\n{"a": 2}\n~~~\nend';
    expect(extractFencedBlocks(text)).toEqual(['[1]', '{"a": 2}']);
  });

  it('returns nothing for unfenced or unclosed text', () => {
    expect(extractFencedBlocks('[1, 2]')).toEqual([]);
    expect(extractFencedBlocks('```json\n[1, 2]')).toEqual([]);
  });
});

describe('findBalancedSpans', () => {
  it('lists outer spans before nested ones, in start order', () => {
    expect(findBalancedSpans('see [2] then {"a": [1]}')).toEqual(['[2]', '{"a": [1]}', '[1]']);
  });

  it('ignores closers inside strings', () => {
    expect(findBalancedSpans('[{"c": "a ] b"}]')).toEqual(['[{"c": "a ] b"}]', '{"c": "a ] b"}']);
  });

  it('skips unbalanced or mismatched openers', () => {
    expect(findBalancedSpans('[1, {2]')).toEqual([]);
    expect(findBalancedSpans('[ unclosed')).toEqual([]);
  });
});
