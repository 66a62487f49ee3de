// pattern: Functional Core (types only)

import type { FilterSpec } from "@/config/schema.ts";

export type { FilterSpec };

/**
 * The simplified, callback-facing representation of one inbound post.
 */
export type FeedRecord = {
  readonly id: string;
  readonly handle: string;
  readonly name: string;
  readonly avatarUrl: string;
  readonly text: string;
  readonly images: ReadonlyArray<string>;
  readonly timestamp: Date;
};

export type MediaKind = "photo" | "video" | "animated_gif";

export type RawMedia = {
  readonly kind: MediaKind;
  readonly url: string;
};

/**
 * A provider message as a transport yields it, before filtering and translation.
 * Media entries keep the order the provider attached them in.
 */
export type RawPost = {
  readonly id: string;
  readonly text: string;
  readonly author: {
    readonly handle: string;
    readonly name: string;
    readonly avatarUrl: string;
  };
  readonly media: ReadonlyArray<RawMedia>;
  readonly createdAt: Date;
};

export type RecordHandler = (record: FeedRecord) => void;

export type SubscribeParams = {
  readonly keywords: ReadonlyArray<string>;
  readonly languages: ReadonlyArray<string>;
  readonly stallWarnings: boolean;
};

/**
 * A live, open stream. `messages` finishes once the stream is closed,
 * either by `close()` or by the provider.
 */
export interface FeedSubscription {
  readonly messages: AsyncIterable<RawPost>;
  close(): void;
}

/**
 * FeedTransport is the authenticated capability a session is built on.
 * Implementations own the wire protocol; the session only sees raw posts.
 */
export interface FeedTransport {
  readonly name: string;
  verifyCredentials(): Promise<void>;
  subscribe(params: SubscribeParams): Promise<FeedSubscription>;
}

export type TransportFactory<C> = (credentials: C) => FeedTransport;
