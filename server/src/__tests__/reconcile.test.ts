import { describe, it, expect } from 'vitest';
import { fillSlots, reconcilePosts } from '../agents/reconcile.js';
import type { AnalyzedImage, Post } from '../agents/types.js';

const images: AnalyzedImage[] = [
  { image_url: 'u1', tags: ['pool'] },
  { image_url: 'u2', tags: [] },
  { image_url: 'u3', tags: ['spa'] },
];

function post(image_url: string, caption: string): Post {
  return Object.freeze({ image_url, caption, hashtags: Object.freeze(['#hotel']) });
}

describe('reconcilePosts', () => {
  it('places exact matches first and fills the rest in order', () => {
    const result = reconcilePosts([
      post('u2', 'B'),
      post('', 'X'),
      post('u1', 'A'),
      post('u2', 'B2'),
      post('elsewhere', 'Y'),
      post('u3', ''),
    ], images);

    expect(result.slots).toEqual([
      { image_url: 'u1', caption: 'A', hashtags: ['#hotel'] },
      { image_url: 'u2', caption: 'B', hashtags: ['#hotel'] },
      { image_url: 'u3', caption: 'X', hashtags: ['#hotel'] },
    ]);
    expect(result.missing).toEqual([]);
    expect(result.dropped).toBe(3);
  });

  it('keeps placed posts frozen', () => {
    const result = reconcilePosts([post('', 'X')], images);
    expect(Object.isFrozen(result.slots[0])).toBe(true);
  });

  it('reports images left without a post', () => {
    const result = reconcilePosts([post('u3', 'C')], images);

    expect(result.slots).toEqual([null, null, { image_url: 'u3', caption: 'C', hashtags: ['#hotel'] }]);
    expect(result.missing).toEqual([images[0], images[1]]);
    expect(result.dropped).toBe(0);
  });
});

describe('fillSlots', () => {
  it('fills only the empty slots of an earlier result', () => {
    const first = reconcilePosts([post('u3', 'C')], images);
    const second = fillSlots(first.slots, [post('', 'F1'), post('u3', 'again'), post('', 'F2')], images);

    expect(second.slots.map((p) => p && [p.image_url, p.caption])).toEqual([
      ['u1', 'F1'],
      ['u2', 'F2'],
      ['u3', 'C'],
    ]);
    expect(second.missing).toEqual([]);
    expect(second.dropped).toBe(1);
  });
});
