// pattern: Functional Core

import type { FeedFilter } from "./filter.ts";
import type { FeedRecord, RawPost } from "./types.ts";

/**
 * Turns a raw post into a feed record, or returns null when the filter rejects it.
 * Only photo media become image URLs; video and animated media are left out.
 */
export function translatePost(post: RawPost, filter?: FeedFilter): FeedRecord | null {
  if (filter && !filter.match(post.author.handle.toLowerCase(), post.text)) {
    return null;
  }

  const images = post.media
    .filter((media) => media.kind === "photo")
    .map((media) => media.url);

  return {
    id: post.id,
    handle: post.author.handle,
    name: post.author.name,
    avatarUrl: post.author.avatarUrl,
    text: post.text,
    images,
    timestamp: post.createdAt,
  };
}
