import { parentPort, workerData } from 'worker_threads';
import { logger } from '../utils/logger.js';
import { startConnectionWorker } from './FeishuConnection.js';

// Entry point of the connection worker thread. The SDK's WebSocket client and
// its reconnect timers live here, away from the host's event loop.

startConnectionWorker(parentPort, workerData).catch((error: unknown) => {
  logger.error('Connection worker crashed:', error);
  process.exit(1);
});
