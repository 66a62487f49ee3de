// pattern: Imperative Shell

import type { EventEmitter } from "node:events";
import { ETwitterStreamEvent, TwitterApi } from "twitter-api-v2";
import { z } from "zod";
import type { TwitterCredentials } from "@/config/schema.ts";
import { createMessageChannel } from "@/feed/channel.ts";
import type {
  FeedSubscription,
  FeedTransport,
  RawMedia,
  RawPost,
  SubscribeParams,
} from "@/feed/types.ts";

const MediaKindSchema = z.enum(["photo", "video", "animated_gif"]);

const MediaSchema = z.object({
  type: z.string(),
  media_url_https: z.string(),
});

const TweetSchema = z.object({
  id_str: z.string(),
  text: z.string(),
  created_at: z.string().optional(),
  timestamp_ms: z.string().optional(),
  user: z.object({
    screen_name: z.string(),
    name: z.string(),
    profile_image_url_https: z.string().default(""),
  }),
  entities: z.object({ media: z.array(MediaSchema).optional() }).optional(),
  extended_entities: z.object({ media: z.array(MediaSchema).optional() }).optional(),
  extended_tweet: z.object({ full_text: z.string() }).optional(),
});

const StallWarningSchema = z.object({
  warning: z.object({
    code: z.string(),
    message: z.string(),
    percent_full: z.number().optional(),
  }),
});

/** The part of a twitter-api-v2 TweetStream a subscription depends on. */
export type TweetStreamLike = EventEmitter & { close(): void };

/** First valid time among timestamp_ms and created_at, else the receipt time. */
function tweetTime(timestampMs: string | undefined, createdAt: string | undefined): Date {
  const candidates = [
    timestampMs ? new Date(Number(timestampMs)) : null,
    createdAt ? new Date(createdAt) : null,
  ];
  for (const date of candidates) {
    if (date && !Number.isNaN(date.getTime())) return date;
  }
  return new Date();
}

/**
 * Parses one payload of the v1.1 statuses/filter stream. Returns null for
 * anything that is not a tweet (limit notices, deletes, warnings).
 */
export function parseTweet(data: unknown): RawPost | null {
  const parsed = TweetSchema.safeParse(data);
  if (!parsed.success) {
    return null;
  }

  const tweet = parsed.data;
  const media: Array<RawMedia> = [];
  for (const entity of tweet.extended_entities?.media ?? tweet.entities?.media ?? []) {
    const kind = MediaKindSchema.safeParse(entity.type);
    if (kind.success) {
      media.push({ kind: kind.data, url: entity.media_url_https });
    }
  }

  const createdAt = tweetTime(tweet.timestamp_ms, tweet.created_at);

  return {
    id: tweet.id_str,
    text: tweet.extended_tweet?.full_text ?? tweet.text,
    author: {
      handle: tweet.user.screen_name,
      name: tweet.user.name,
      avatarUrl: tweet.user.profile_image_url_https,
    },
    media,
    createdAt,
  };
}

export function subscriptionFromStream(stream: TweetStreamLike, capacity: number): FeedSubscription {
  const channel = createMessageChannel<RawPost>(capacity, "twitter");

  stream.on(ETwitterStreamEvent.Data, (data: unknown) => {
    const post = parseTweet(data);
    if (post) {
      channel.push(post);
      return;
    }

    const stall = StallWarningSchema.safeParse(data);
    if (stall.success) {
      const { code, message } = stall.data.warning;
      console.warn(`[twitter] stall warning ${code}: ${message}`);
    }
  });

  stream.on(ETwitterStreamEvent.ConnectionError, (error: unknown) => {
    console.error("[twitter] stream connection error:", error);
    channel.close();
  });

  stream.on(ETwitterStreamEvent.ConnectionClosed, () => {
    channel.close();
  });

  return {
    messages: channel,
    close(): void {
      stream.close();
      channel.close();
    },
  };
}

export type TwitterTransportOptions = {
  readonly client?: TwitterApi;
  readonly capacity?: number;
};

export function createTwitterTransport(
  credentials: TwitterCredentials,
  options: TwitterTransportOptions = {},
): FeedTransport {
  const client =
    options.client ??
    new TwitterApi({
      appKey: credentials.consumer_key,
      appSecret: credentials.consumer_secret,
      accessToken: credentials.access_key,
      accessSecret: credentials.access_secret,
    });
  const capacity = options.capacity ?? 1000;

  return {
    name: "twitter",

    async verifyCredentials(): Promise<void> {
      await client.v1.verifyCredentials();
    },

    async subscribe(params: SubscribeParams): Promise<FeedSubscription> {
      const stream = await client.v1.filterStream({
        track: params.keywords.join(","),
        ...(params.languages.length > 0 && { language: params.languages.join(",") }),
        stall_warnings: params.stallWarnings,
      });
      return subscriptionFromStream(stream, capacity);
    },
  };
}
