// pattern: Imperative Shell

import { loadConfig } from '@/config/config';
import { createShutdownHandler, formatRecord, openSession } from '@/index';

async function main(): Promise<void> {
  console.log('feedstream starting...\n');

  const config = loadConfig(process.argv[2]);
  const session = await openSession(config);
  console.log(`authenticated to ${session.transport}`);

  session.onRecord((record) => {
    console.log(formatRecord(record));
  });

  await session.start();
  console.log(`${session.transport} stream started (tracking ${config.filter.keywords.join(', ')})`);

  const shutdownHandler = createShutdownHandler(session);
  process.on('SIGINT', shutdownHandler);
  process.on('SIGTERM', shutdownHandler);
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
