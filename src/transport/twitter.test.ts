// pattern: Imperative Shell

import { EventEmitter } from "node:events";
import { describe, it, expect, vi, afterEach } from "vitest";
import { ETwitterStreamEvent } from "twitter-api-v2";
import type { TwitterApi } from "twitter-api-v2";
import type { TwitterCredentials } from "@/config/schema.ts";
import type { RawPost } from "@/feed/types.ts";
import { createTwitterTransport, parseTweet, subscriptionFromStream } from "./twitter.ts";

class FakeTweetStream extends EventEmitter {
  closeCalls = 0;

  close(): void {
    this.closeCalls++;
    this.emit(ETwitterStreamEvent.ConnectionClosed);
  }
}

const credentials: TwitterCredentials = {
  consumer_key: "test-consumer-key",
  consumer_secret: "test-consumer-secret",
  access_key: "test-access-key",
  access_secret: "test-access-secret",
};

function tweet(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id_str: "1760000000000000001",
    text: "hello typescript",
    created_at: "Fri Mar 01 12:00:00 +0000 2024",
    user: {
      screen_name: "Alice",
      name: "Alice Example",
      profile_image_url_https: "https://pbs.example.com/alice.jpg",
    },
    ...overrides,
  };
}

async function collect(messages: AsyncIterable<RawPost>): Promise<Array<RawPost>> {
  const posts: Array<RawPost> = [];
  for await (const post of messages) {
    posts.push(post);
  }
  return posts;
}

describe("parseTweet", () => {
  it("should map a tweet to a raw post", () => {
    const post = parseTweet(tweet());

    expect(post).toEqual({
      id: "1760000000000000001",
      text: "hello typescript",
      author: {
        handle: "Alice",
        name: "Alice Example",
        avatarUrl: "https://pbs.example.com/alice.jpg",
      },
      media: [],
      createdAt: new Date("2024-03-01T12:00:00.000Z"),
    });
  });

  it("should prefer timestamp_ms over created_at", () => {
    const post = parseTweet(tweet({ timestamp_ms: "1709294400123" }));

    expect(post?.createdAt.getTime()).toBe(1709294400123);
  });

  it("should fall back to created_at when timestamp_ms is not numeric", () => {
    const post = parseTweet(tweet({ timestamp_ms: "not-a-number" }));

    expect(post?.createdAt).toEqual(new Date("2024-03-01T12:00:00.000Z"));
  });

  it("should fall back to the receipt time when no source time parses", () => {
    const before = Date.now();
    const post = parseTweet(tweet({ timestamp_ms: "soon", created_at: "sometime" }));

    expect(Number.isNaN(post?.createdAt.getTime())).toBe(false);
    expect(post?.createdAt.getTime()).toBeGreaterThanOrEqual(before);
    expect(() => post?.createdAt.toISOString()).not.toThrow();
  });

  it("should prefer the extended full text", () => {
    const post = parseTweet(
      tweet({ text: "truncated…", extended_tweet: { full_text: "the whole long tweet" } }),
    );

    expect(post?.text).toBe("the whole long tweet");
  });

  it("should take media from extended_entities before entities, in order", () => {
    const post = parseTweet(
      tweet({
        entities: {
          media: [{ type: "photo", media_url_https: "https://pbs.example.com/only-first.jpg" }],
        },
        extended_entities: {
          media: [
            { type: "photo", media_url_https: "https://pbs.example.com/1.jpg" },
            { type: "video", media_url_https: "https://pbs.example.com/2.jpg" },
            { type: "photo", media_url_https: "https://pbs.example.com/3.jpg" },
          ],
        },
      }),
    );

    expect(post?.media).toEqual([
      { kind: "photo", url: "https://pbs.example.com/1.jpg" },
      { kind: "video", url: "https://pbs.example.com/2.jpg" },
      { kind: "photo", url: "https://pbs.example.com/3.jpg" },
    ]);
  });

  it("should skip media of unknown kinds", () => {
    const post = parseTweet(
      tweet({
        entities: {
          media: [
            { type: "hologram", media_url_https: "https://pbs.example.com/h.bin" },
            { type: "photo", media_url_https: "https://pbs.example.com/p.jpg" },
          ],
        },
      }),
    );

    expect(post?.media).toEqual([{ kind: "photo", url: "https://pbs.example.com/p.jpg" }]);
  });

  it("should return null for payloads that are not tweets", () => {
    expect(parseTweet({ limit: { track: 12 } })).toBeNull();
    expect(parseTweet({ delete: { status: { id_str: "1" } } })).toBeNull();
    expect(parseTweet(null)).toBeNull();
  });
});

describe("subscriptionFromStream", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should yield parsed tweets until the connection closes", async () => {
    const stream = new FakeTweetStream();
    const subscription = subscriptionFromStream(stream, 10);

    stream.emit(ETwitterStreamEvent.Data, tweet({ id_str: "1" }));
    stream.emit(ETwitterStreamEvent.Data, { limit: { track: 3 } });
    stream.emit(ETwitterStreamEvent.Data, tweet({ id_str: "2" }));
    stream.emit(ETwitterStreamEvent.ConnectionClosed);

    const posts = await collect(subscription.messages);
    expect(posts.map((post) => post.id)).toEqual(["1", "2"]);
  });

  it("should log stall warnings instead of yielding them", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const stream = new FakeTweetStream();
    const subscription = subscriptionFromStream(stream, 10);

    stream.emit(ETwitterStreamEvent.Data, {
      warning: { code: "FALLING_BEHIND", message: "queue is 60% full", percent_full: 60 },
    });
    stream.emit(ETwitterStreamEvent.ConnectionClosed);

    expect(await collect(subscription.messages)).toEqual([]);
    expect(warn).toHaveBeenCalledWith("[twitter] stall warning FALLING_BEHIND: queue is 60% full");
  });

  it("should finish the messages when the connection errors", async () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const stream = new FakeTweetStream();
    const subscription = subscriptionFromStream(stream, 10);

    stream.emit(ETwitterStreamEvent.Data, tweet({ id_str: "7" }));
    stream.emit(ETwitterStreamEvent.ConnectionError, new Error("socket hang up"));

    const posts = await collect(subscription.messages);
    expect(posts.map((post) => post.id)).toEqual(["7"]);
  });

  it("should close the underlying stream on close", async () => {
    const stream = new FakeTweetStream();
    const subscription = subscriptionFromStream(stream, 10);

    subscription.close();

    expect(stream.closeCalls).toBe(1);
    expect(await collect(subscription.messages)).toEqual([]);
  });
});

describe("createTwitterTransport", () => {
  function fakeClient(stream: FakeTweetStream) {
    const v1 = {
      verifyCredentials: vi.fn(async () => ({ screen_name: "feed-bot" })),
      filterStream: vi.fn(async () => stream),
    };
    return { v1, client: { v1 } as unknown as TwitterApi };
  }

  it("should verify credentials through the v1 API", async () => {
    const { v1, client } = fakeClient(new FakeTweetStream());
    const transport = createTwitterTransport(credentials, { client });

    await transport.verifyCredentials();

    expect(transport.name).toBe("twitter");
    expect(v1.verifyCredentials).toHaveBeenCalledTimes(1);
  });

  it("should open a filter stream with comma-joined tracks and languages", async () => {
    const { v1, client } = fakeClient(new FakeTweetStream());
    const transport = createTwitterTransport(credentials, { client });

    await transport.subscribe({
      keywords: ["typescript", "node js"],
      languages: ["en", "es"],
      stallWarnings: true,
    });

    expect(v1.filterStream).toHaveBeenCalledWith({
      track: "typescript,node js",
      language: "en,es",
      stall_warnings: true,
    });
  });

  it("should leave out the language parameter when no languages are set", async () => {
    const { v1, client } = fakeClient(new FakeTweetStream());
    const transport = createTwitterTransport(credentials, { client });

    await transport.subscribe({ keywords: ["typescript"], languages: [], stallWarnings: true });

    expect(v1.filterStream).toHaveBeenCalledWith({ track: "typescript", stall_warnings: true });
  });

  it("should surface a failed stream open", async () => {
    const { v1, client } = fakeClient(new FakeTweetStream());
    v1.filterStream.mockRejectedValueOnce(new Error("403 Forbidden"));
    const transport = createTwitterTransport(credentials, { client });

    await expect(
      transport.subscribe({ keywords: ["typescript"], languages: [], stallWarnings: true }),
    ).rejects.toThrow("403 Forbidden");
  });
});
