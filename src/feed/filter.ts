// pattern: Functional Core

import type { FilterSpec } from "./types.ts";

export type FeedFilter = {
  match(author: string, text: string): boolean;
};

/**
 * Builds the client-side allow/deny predicate for a filter spec.
 *
 * Deny lists are checked before the allow list, so a blocked author or word
 * can never be let through by also being allow-listed. An empty list places
 * no constraint. Author handles compare case-insensitively; blocked words are
 * literal, case-sensitive substrings of the text.
 */
export function createFeedFilter(spec: FilterSpec): FeedFilter {
  const blockedUsers = new Set(spec.blocked_users.map((user) => user.toLowerCase()));
  const allowedUsers = new Set(spec.allowed_users.map((user) => user.toLowerCase()));
  const blockedWords = [...spec.blocked_words];

  return {
    match(author: string, text: string): boolean {
      const handle = author.toLowerCase();

      if (blockedUsers.size > 0 && blockedUsers.has(handle)) {
        return false;
      }

      if (blockedWords.length > 0 && blockedWords.some((word) => text.includes(word))) {
        return false;
      }

      if (allowedUsers.size > 0) {
        return allowedUsers.has(handle);
      }

      return true;
    },
  };
}
