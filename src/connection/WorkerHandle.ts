import path from 'path';
import { Worker } from 'worker_threads';
import { logger } from '../utils/logger.js';
import { serializeError } from '../utils/errors.js';
import {
  isConnectionMessage,
  type ConnectionContext,
  type ConnectionListener,
  type ConnectionOptions,
} from './types.js';

const WORKER_SCRIPT = path.join(__dirname, 'connectionWorker.js');

/**
 * Runs the Feishu connection in a worker thread.
 * Forwards the worker's messages, and reports an uncaught worker error as `failed`.
 */
export class WorkerHandle implements ConnectionContext {
  private worker: Worker | null = null;
  private alive: boolean = false;

  constructor(
    private readonly options: ConnectionOptions,
    private readonly script: string = WORKER_SCRIPT
  ) {}

  start(listener: ConnectionListener): void {
    if (this.worker) {
      throw new Error('Worker already started');
    }

    const worker = new Worker(this.script, { workerData: this.options });
    this.worker = worker;
    this.alive = true;

    worker.on('exit', (code: number) => {
      logger.info(`Connection worker ${worker.threadId} exited with code ${code}`);
      this.alive = false;
    });

    this.attach(worker, listener);
    logger.debug(`Connection worker started: thread ${worker.threadId}`);
  }

  resume(listener: ConnectionListener): void {
    if (!this.worker) {
      throw new Error('Worker not started');
    }

    this.worker.removeAllListeners('error');
    this.attach(this.worker, listener);
    this.worker.ref();
    logger.debug(`Connection worker resumed: thread ${this.worker.threadId}`);
  }

  isAlive(): boolean {
    return this.alive;
  }

  detach(): void {
    if (!this.worker) return;

    this.worker.removeAllListeners('message');
    this.worker.removeAllListeners('error');
    // An unhandled 'error' event would throw in the host
    this.worker.on('error', (error: Error) => {
      logger.debug('Detached connection worker error:', error);
    });
    this.worker.unref();
  }

  private attach(worker: Worker, listener: ConnectionListener): void {
    worker.on('message', (message: unknown) => {
      if (isConnectionMessage(message)) {
        listener(message);
      } else {
        logger.warn('Ignoring unrecognized message from connection worker');
      }
    });

    worker.on('error', (error: Error) => {
      logger.error('Connection worker error:', error);
      listener({ type: 'failed', error: serializeError(error) });
    });
  }
}

export function createWorkerContext(options: ConnectionOptions): ConnectionContext {
  return new WorkerHandle(options);
}
