// pattern: Imperative Shell

import { FeedError, describeError } from "./errors.ts";
import { createFeedFilter } from "./filter.ts";
import { translatePost } from "./translate.ts";
import type {
  FeedSubscription,
  FeedTransport,
  FilterSpec,
  RecordHandler,
  TransportFactory,
} from "./types.ts";

export type StreamSessionOptions<C> = {
  readonly credentials: C | null | undefined;
  readonly filter: FilterSpec | null | undefined;
  readonly transport: TransportFactory<C>;
  /** Bound on the authentication round-trip, in milliseconds. */
  readonly authTimeout: number;
};

export interface StreamSession {
  readonly transport: string;
  readonly filter: FilterSpec;
  readonly running: boolean;
  onRecord(handler: RecordHandler): void;
  start(): Promise<void>;
  stop(): Promise<void>;
}

/** `opened` settles once the subscribe attempt has finished, either way. */
type StartingState = { readonly status: "starting"; readonly opened: Promise<void> };

type SessionState =
  | { readonly status: "idle" }
  | StartingState
  | {
      readonly status: "running";
      readonly subscription: FeedSubscription;
      readonly loop: Promise<void>;
    };

const IDLE: SessionState = { status: "idle" };

function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`${label} timed out after ${ms}ms`)), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

/**
 * Validates the inputs, authenticates against the provider and returns an idle
 * session. Missing credentials or an empty keyword list fail before the
 * transport is built, so no network call is made for them.
 */
export async function createStreamSession<C>(
  options: StreamSessionOptions<C>,
): Promise<StreamSession> {
  const { credentials, filter } = options;

  if (credentials === null || credentials === undefined) {
    throw new FeedError("no_auth", "feed credentials cannot be nil");
  }
  if (!filter || filter.keywords.length === 0) {
    throw new FeedError("empty_filter", "feed stream filter cannot be empty or nil");
  }

  const transport = options.transport(credentials);

  try {
    await withTimeout(transport.verifyCredentials(), options.authTimeout, "authentication");
  } catch (error) {
    throw new FeedError(
      "auth_failed",
      `cannot authenticate to ${transport.name}: ${describeError(error)}`,
      { cause: error },
    );
  }

  return createSession(transport, filter);
}

function createSession(transport: FeedTransport, filter: FilterSpec): StreamSession {
  const matcher = createFeedFilter(filter);
  let handler: RecordHandler | null = null;
  let state: SessionState = IDLE;

  async function receive(subscription: FeedSubscription): Promise<void> {
    try {
      for await (const post of subscription.messages) {
        const record = translatePost(post, matcher);
        if (!record) continue;

        const current = handler;
        if (!current) continue;

        try {
          current(record);
        } catch (error) {
          console.error(`[feed] record handler error: ${describeError(error)}`);
        }
      }
    } catch (error) {
      console.error(`[feed] ${transport.name} stream error:`, error);
    } finally {
      // a newer subscription may already own the slot
      if (state.status === "running" && state.subscription === subscription) {
        state = IDLE;
      }
    }
  }

  return {
    transport: transport.name,
    filter,

    get running(): boolean {
      return state.status !== "idle";
    },

    onRecord(next: RecordHandler): void {
      handler = next;
    },

    async start(): Promise<void> {
      if (state.status !== "idle") {
        throw new FeedError("already_started", "feed stream already started");
      }

      let settle: () => void = () => {};
      state = {
        status: "starting",
        opened: new Promise<void>((resolve) => {
          settle = resolve;
        }),
      };

      let subscription: FeedSubscription;
      try {
        subscription = await transport.subscribe({
          keywords: filter.keywords,
          languages: filter.languages,
          stallWarnings: true,
        });
      } catch (error) {
        state = IDLE;
        settle();
        throw new FeedError(
          "subscription_failed",
          `unable to start ${transport.name} filter: ${describeError(error)}`,
          { cause: error },
        );
      }

      const loop = receive(subscription);
      state = { status: "running", subscription, loop };
      settle();
    },

    async stop(): Promise<void> {
      if (state.status === "idle") return;

      // wait for a pending start, then close whatever it opened
      if (state.status === "starting") {
        await state.opened;
      }
      if (state.status !== "running") return;

      const { subscription, loop } = state;
      subscription.close();
      await loop;
    },
  };
}
