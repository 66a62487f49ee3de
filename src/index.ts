// pattern: Imperative Shell

/**
 * Feed stream composition root.
 * Wires configuration to a transport and a stream session; main.ts runs it.
 */

import { createStreamSession } from '@/feed';
import { createBlueskyTransport, createTwitterTransport } from '@/transport';
import type { AppConfig } from '@/config/schema';
import type { FeedRecord, StreamSession } from '@/feed';

/**
 * Build the session for the configured provider. Credentials missing from the
 * config reach the session as undefined and fail there as "no_auth".
 */
export function openSession(config: AppConfig): Promise<StreamSession> {
  const base = { filter: config.filter, authTimeout: config.auth_timeout };
  const capacity = config.channel_capacity;

  switch (config.provider) {
    case 'twitter':
      return createStreamSession({
        ...base,
        credentials: config.twitter,
        transport: (credentials) => createTwitterTransport(credentials, { capacity }),
      });
    case 'bluesky':
      return createStreamSession({
        ...base,
        credentials: config.bluesky,
        transport: (credentials) => createBlueskyTransport(credentials, { capacity }),
      });
  }
}

export function formatRecord(record: FeedRecord): string {
  const text = record.text.replace(/\s+/g, ' ').trim();
  const images = record.images.length > 0 ? ` [${record.images.length} image(s)]` : '';
  return `${record.timestamp.toISOString()} @${record.handle} (${record.name}): ${text}${images}`;
}

/**
 * Stop the stream without exiting - for testability.
 */
export async function performShutdown(session: StreamSession): Promise<void> {
  try {
    await session.stop();
    console.log(`${session.transport} stream stopped`);
  } catch (error) {
    console.error(`error stopping ${session.transport} stream:`, error);
  }
}

export function createShutdownHandler(session: StreamSession): () => Promise<void> {
  return async (): Promise<void> => {
    console.log('\nShutting down...');
    await performShutdown(session);
    process.exit(0);
  };
}
