// pattern: Functional Core (barrel export)

export { createTwitterTransport, parseTweet, subscriptionFromStream } from "./twitter.ts";
export type { TweetStreamLike, TwitterTransportOptions } from "./twitter.ts";
export {
  createBlueskyTransport,
  createProfileResolver,
  acceptCommit,
  extractMedia,
  matchesTrack,
  matchesLanguage,
  postFromCommit,
} from "./bluesky.ts";
export type { AuthorProfile, BlueskyTransportOptions, ProfileResolver } from "./bluesky.ts";
