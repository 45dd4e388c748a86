import type { AnalyzedImage, Post } from './types.js';

export interface ReconcileResult {
  /** One entry per image, in image order; null where no post fit. */
  slots: (Post | null)[];
  /** Images whose slot is still empty. */
  missing: AnalyzedImage[];
  /** Posts that matched no slot. */
  dropped: number;
}

/**
 * Align normalized posts with the analyzed images.
 *
 * Exact `image_url` matches claim their slot first. Posts with a missing or
 * unknown URL then fill the remaining slots in order. Posts without a caption
 * never fill a slot; a second post for an already-filled URL and any surplus
 * are dropped. Every placed post carries
 * the URL of the slot it landed in.
 */
export function reconcilePosts(posts: readonly Post[], images: readonly AnalyzedImage[]): ReconcileResult {
  return fillSlots(new Array<Post | null>(images.length).fill(null), posts, images);
}

/** Place `posts` into the empty slots of an existing reconciliation. */
export function fillSlots(
  initial: readonly (Post | null)[],
  posts: readonly Post[],
  images: readonly AnalyzedImage[],
): ReconcileResult {
  const slots = [...initial];
  const slotByUrl = new Map<string, number>();
  images.forEach((image, i) => {
    if (!slotByUrl.has(image.image_url)) slotByUrl.set(image.image_url, i);
  });

  let dropped = 0;
  const unplaced: Post[] = [];

  for (const post of posts) {
    if (!post.caption) {
      dropped += 1;
      continue;
    }
    const index = slotByUrl.get(post.image_url);
    if (index === undefined) {
      unplaced.push(post);
    } else if (slots[index] === null) {
      slots[index] = post;
    } else {
      dropped += 1;
    }
  }

  for (const post of unplaced) {
    const index = slots.findIndex((slot) => slot === null);
    if (index < 0) {
      dropped += 1;
      continue;
    }
    slots[index] = post;
  }

  const placed = slots.map((slot, i) =>
    slot && slot.image_url !== images[i].image_url
      ? Object.freeze({ ...slot, image_url: images[i].image_url })
      : slot,
  );

  return {
    slots: placed,
    missing: images.filter((_, i) => placed[i] === null),
    dropped,
  };
}
