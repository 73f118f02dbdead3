import { initSentry } from './utils/sentry';
import { startServer } from './http/server';

initSentry();

startServer().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
