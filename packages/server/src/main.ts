import { getErrorMessage } from '@quotapass/core';
import { startServer } from './index.js';
import { createLogger } from './lib/logger.js';

startServer().catch((err: unknown) => {
  createLogger('Server').error('Failed to start', { error: getErrorMessage(err) });
  process.exit(1);
});
