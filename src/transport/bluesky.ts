// pattern: Imperative Shell

import { BskyAgent } from "@atproto/api";
import { JetstreamSubscription } from "@atcute/jetstream";
import type { CommitEvent } from "@atcute/jetstream";
import { z } from "zod";
import type { BlueskyCredentials } from "@/config/schema.ts";
import { createMessageChannel } from "@/feed/channel.ts";
import { describeError } from "@/feed/errors.ts";
import type {
  FeedSubscription,
  FeedTransport,
  RawMedia,
  RawPost,
  SubscribeParams,
} from "@/feed/types.ts";

const POST_COLLECTION = "app.bsky.feed.post";
const PROFILE_CACHE_SIZE = 5000;

const BlobSchema = z.object({
  ref: z.object({ $link: z.string() }),
});

const ImagesEmbedSchema = z.object({
  $type: z.literal("app.bsky.embed.images"),
  images: z.array(z.object({ image: BlobSchema })),
});

const VideoEmbedSchema = z.object({
  $type: z.literal("app.bsky.embed.video"),
  video: BlobSchema,
});

const RecordWithMediaSchema = z.object({
  $type: z.literal("app.bsky.embed.recordWithMedia"),
  media: z.unknown(),
});

const PostRecordSchema = z.object({
  text: z.string(),
  langs: z.array(z.string()).optional(),
  embed: z.unknown().optional(),
});

export type PostRecord = z.infer<typeof PostRecordSchema>;

export type AuthorProfile = {
  readonly handle: string;
  readonly name: string;
  readonly avatarUrl: string;
};

export function isCommitEvent(event: { kind: string }): event is CommitEvent {
  return event.kind === "commit";
}

/**
 * Track phrases follow the statuses/filter rules: a phrase matches when every
 * space-separated word in it occurs in the text, ignoring case. Any one phrase
 * is enough.
 */
export function matchesTrack(text: string, tracks: ReadonlyArray<string>): boolean {
  const haystack = text.toLowerCase();
  return tracks.some((phrase) => {
    const words = phrase.toLowerCase().split(/\s+/).filter((word) => word.length > 0);
    return words.length > 0 && words.every((word) => haystack.includes(word));
  });
}

export function matchesLanguage(
  langs: ReadonlyArray<string> | undefined,
  languages: ReadonlyArray<string>,
): boolean {
  if (languages.length === 0) return true;
  return (langs ?? []).some((lang) => languages.includes(lang));
}

/**
 * Returns the post record of a commit event when it creates a post matching
 * the subscription's keywords and languages, null otherwise.
 */
export function acceptCommit(event: CommitEvent, params: SubscribeParams): PostRecord | null {
  const commit = event.commit;

  if (commit.operation !== "create" || commit.collection !== POST_COLLECTION) {
    return null;
  }

  const parsed = PostRecordSchema.safeParse(commit.record);
  if (!parsed.success) {
    return null;
  }

  const record = parsed.data;
  if (!matchesTrack(record.text, params.keywords)) return null;
  if (!matchesLanguage(record.langs, params.languages)) return null;

  return record;
}

export function extractMedia(did: string, embed: unknown): Array<RawMedia> {
  const images = ImagesEmbedSchema.safeParse(embed);
  if (images.success) {
    return images.data.images.map((entry): RawMedia => ({
      kind: "photo",
      url: `https://cdn.bsky.app/img/feed_fullsize/plain/${did}/${entry.image.ref.$link}@jpeg`,
    }));
  }

  const video = VideoEmbedSchema.safeParse(embed);
  if (video.success) {
    const cid = video.data.video.ref.$link;
    return [
      {
        kind: "video",
        url: `https://video.bsky.app/watch/${encodeURIComponent(did)}/${cid}/playlist.m3u8`,
      },
    ];
  }

  const withMedia = RecordWithMediaSchema.safeParse(embed);
  if (withMedia.success) {
    return extractMedia(did, withMedia.data.media);
  }

  return [];
}

export function postFromCommit(
  event: CommitEvent,
  record: PostRecord,
  profile: AuthorProfile,
): RawPost {
  return {
    id: `at://${event.did}/${POST_COLLECTION}/${event.commit.rkey}`,
    text: record.text,
    author: profile,
    media: extractMedia(event.did, record.embed),
    createdAt: new Date(Math.floor(event.time_us / 1000)),
  };
}

export type ProfileResolver = {
  resolve(did: string): Promise<AuthorProfile>;
  readonly size: number;
};

export function createProfileResolver(
  agent: BskyAgent,
  maxSize = PROFILE_CACHE_SIZE,
): ProfileResolver {
  const cache = new Map<string, AuthorProfile>();

  return {
    async resolve(did: string): Promise<AuthorProfile> {
      const cached = cache.get(did);
      if (cached) return cached;

      let profile: AuthorProfile;
      try {
        const { data } = await agent.getProfile({ actor: did });
        profile = {
          handle: data.handle,
          name: data.displayName ?? data.handle,
          avatarUrl: data.avatar ?? "",
        };
      } catch (error) {
        console.warn(`[bluesky] profile lookup failed for ${did}: ${describeError(error)}`);
        return { handle: did, name: did, avatarUrl: "" };
      }

      if (cache.size >= maxSize) {
        const oldest = cache.keys().next();
        if (!oldest.done) cache.delete(oldest.value);
      }
      cache.set(did, profile);
      return profile;
    },

    get size(): number {
      return cache.size;
    },
  };
}

export type BlueskyTransportOptions = {
  readonly agent?: BskyAgent;
  readonly capacity?: number;
};

export function createBlueskyTransport(
  credentials: BlueskyCredentials,
  options: BlueskyTransportOptions = {},
): FeedTransport {
  const agent = options.agent ?? new BskyAgent({ service: credentials.service });
  const capacity = options.capacity ?? 1000;
  const profiles = createProfileResolver(agent);

  return {
    name: "bluesky",

    async verifyCredentials(): Promise<void> {
      await agent.login({
        identifier: credentials.identifier,
        password: credentials.app_password,
      });
    },

    async subscribe(params: SubscribeParams): Promise<FeedSubscription> {
      const channel = createMessageChannel<RawPost>(capacity, "bluesky");
      const jetstream = new JetstreamSubscription({
        url: credentials.jetstream_url,
        wantedCollections: [POST_COLLECTION],
      });
      const iterator = jetstream[Symbol.asyncIterator]();

      const pump = async (): Promise<void> => {
        try {
          while (!channel.closed) {
            const next = await iterator.next();
            if (next.done) break;

            const event = next.value;
            if (!isCommitEvent(event)) continue;

            const record = acceptCommit(event, params);
            if (!record) continue;

            const profile = await profiles.resolve(event.did);
            channel.push(postFromCommit(event, record, profile));
          }
        } finally {
          channel.close();
        }
      };

      pump().catch((error: unknown) => {
        console.error("[bluesky] Jetstream subscription error:", error);
      });

      return {
        messages: channel,
        close(): void {
          channel.close();
          iterator.return?.().catch((error: unknown) => {
            console.warn(`[bluesky] error closing Jetstream: ${describeError(error)}`);
          });
        },
      };
    },
  };
}
