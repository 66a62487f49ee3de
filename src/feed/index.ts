// pattern: Functional Core (barrel export)

export type {
  FeedRecord,
  FeedSubscription,
  FeedTransport,
  FilterSpec,
  MediaKind,
  RawMedia,
  RawPost,
  RecordHandler,
  SubscribeParams,
  TransportFactory,
} from "./types.ts";
export type { FeedErrorCode } from "./errors.ts";
export type { FeedFilter } from "./filter.ts";
export type { MessageChannel } from "./channel.ts";
export type { StreamSession, StreamSessionOptions } from "./session.ts";
export { FeedError, isFeedError } from "./errors.ts";
export { createFeedFilter } from "./filter.ts";
export { translatePost } from "./translate.ts";
export { createMessageChannel } from "./channel.ts";
export { createStreamSession } from "./session.ts";
