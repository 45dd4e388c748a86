import { describe, it, expect } from 'vitest';
import { NormalizationError } from '../lib/errors.js';
import { MAX_HASHTAGS, coerceHashtags, normalizePosts } from '../agents/normalizer.js';

describe('normalizePosts', () => {
  it('parses a fenced JSON array', () => {
    const raw = '```json\n[{"image_url":"https://img.test/1.jpg","caption":"Pool day","hashtags":["#pool","#sun"]}]\n```';

    expect(normalizePosts(raw)).toEqual([
      { image_url: 'https://img.test/1.jpg', caption: 'Pool day', hashtags: ['#pool', '#sun'] },
    ]);
  });

  it('gives the same posts when run on its own output', () => {
    const once = normalizePosts('~~~\n[{"image_url":"u1","caption":" Lobby ","hashtags":"#lobby #design"}]\n~~~');
    expect(normalizePosts(once)).toEqual(once);
    expect(once).toEqual([{ image_url: 'u1', caption: 'Lobby', hashtags: ['#lobby', '#design'] }]);
  });

  it('unwraps posts, final_posts and data wrappers and accepts field aliases', () => {
    expect(normalizePosts('{"posts": [{"image": "u1", "text": "Hi", "tags": "#a"}]}')).toEqual([
      { image_url: 'u1', caption: 'Hi', hashtags: ['#a'] },
    ]);
    expect(normalizePosts({ final_posts: [{ imageUrl: 'u2', caption: 'Yo', hash_tags: ['b'] }] })).toEqual([
      { image_url: 'u2', caption: 'Yo', hashtags: ['#b'] },
    ]);
    expect(normalizePosts({ data: '[{"url": "u3", "caption": "Hey"}]' })).toEqual([
      { image_url: 'u3', caption: 'Hey', hashtags: [] },
    ]);
  });

  it('accepts a single post object', () => {
    expect(normalizePosts('{"caption":"Solo","image_url":"u1"}')).toEqual([
      { image_url: 'u1', caption: 'Solo', hashtags: [] },
    ]);
  });

  it('decodes a JSON string that itself holds JSON', () => {
    const raw = JSON.stringify(JSON.stringify([{ caption: 'Nested' }]));
    expect(normalizePosts(raw)).toEqual([{ image_url: '', caption: 'Nested', hashtags: [] }]);
  });

  it('repairs single quotes and True/False/None keywords', () => {
    const raw = "[{'image_url': 'u1', 'caption': 'Nice', 'hashtags': None}]";
    expect(normalizePosts(raw)).toEqual([{ image_url: 'u1', caption: 'Nice', hashtags: [] }]);
  });

  it('drops candidates with neither caption nor image_url and keeps order', () => {
    const raw = '[{"caption":"A","image_url":"u1"},{"hashtags":["#x"]},"junk",{"url":"u3"}]';
    expect(normalizePosts(raw)).toEqual([
      { image_url: 'u1', caption: 'A', hashtags: [] },
      { image_url: 'u3', caption: '', hashtags: [] },
    ]);
  });

  it('returns frozen posts', () => {
    const [post] = normalizePosts('[{"image_url":"u1","caption":"A","hashtags":["#a"]}]');
    expect(Object.isFrozen(post)).toBe(true);
    expect(Object.isFrozen(post.hashtags)).toBe(true);
  });

  describe('posts embedded in prose', () => {
    const arr = JSON.stringify([
      { image_url: 'u1', caption: 'Pool day', hashtags: ['#pool'] },
      { image_url: 'u2', caption: 'Suite life', hashtags: ['#suite'] },
    ]);
    const expected = [
      { image_url: 'u1', caption: 'Pool day', hashtags: ['#pool'] },
      { image_url: 'u2', caption: 'Suite life', hashtags: ['#suite'] },
    ];

    it('ignores a bracketed note after the array', () => {
      expect(normalizePosts(`${arr}\n\nNote: hashtags are [optional] and can be edited.`)).toEqual(expected);
    });

    it('skips a bracketed number before the array', () => {
      expect(normalizePosts(`Here are the posts for the [2] images:\n${arr}`)).toEqual(expected);
    });

    it('reads a fenced block in the middle of the reply', () => {
      const raw = `Sure! Posts below.\n\`\`\`json\n${arr}\n\`\`\`\nLet me know if you want changes [e.g. tone].`;
      expect(normalizePosts(raw)).toEqual(expected);
    });

    it('keeps brackets that sit inside captions', () => {
      const raw = `Draft [v2]: ${JSON.stringify([{ image_url: 'u1', caption: 'Sunset [golden hour]' }])}`;
      expect(normalizePosts(raw)).toEqual([{ image_url: 'u1', caption: 'Sunset [golden hour]', hashtags: [] }]);
    });
  });

  it('throws NormalizationError when nothing is recoverable', () => {
    expect(() => normalizePosts('Sorry, I cannot help with that.')).toThrow(NormalizationError);
    expect(() => normalizePosts('')).toThrow(NormalizationError);
    expect(() => normalizePosts(42)).toThrow(NormalizationError);
    expect(() => normalizePosts('Options: [a] or [b].')).toThrow(NormalizationError);
  });

  it('throws NormalizationError when every candidate is dropped', () => {
    expect(() => normalizePosts('[{"hashtags": ["#x"]}]')).toThrow(
      'None of the 1 post candidates had a caption or image_url',
    );
    expect(() => normalizePosts('[]')).toThrow(NormalizationError);
  });
});

describe('coerceHashtags', () => {
  it('splits a delimited string', () => {
    expect(coerceHashtags('#beach #sunset, travel;luxury')).toEqual(['#beach', '#sunset', '#travel', '#luxury']);
    expect(coerceHashtags('#a#b')).toEqual(['#a', '#b']);
  });

  it('treats each array item as one tag', () => {
    expect(coerceHashtags(['#sea view', 'rooftop-bar'])).toEqual(['#seaview', '#rooftopbar']);
  });

  it('drops duplicates case-insensitively and caps the count', () => {
    const tags = coerceHashtags(['#Pool', '#pool', 'Sun', '#sea view', 'x', 'y', 'z']);
    expect(tags).toEqual(['#Pool', '#Sun', '#seaview', '#x', '#y']);
    expect(tags).toHaveLength(MAX_HASHTAGS);
  });

  it('keeps letters from any script', () => {
    expect(coerceHashtags('#café #東京')).toEqual(['#café', '#東京']);
  });

  it('ignores values that are not strings or arrays', () => {
    expect(coerceHashtags(42)).toEqual([]);
    expect(coerceHashtags(null)).toEqual([]);
    expect(coerceHashtags(['#ok', 7, '###'])).toEqual(['#ok']);
  });
});
