import { logger } from '../utils/logger.js';
import { serializeError, toStartupError, type StartupError } from '../utils/errors.js';
import { createWorkerContext } from './WorkerHandle.js';
import type {
  ConnectionContext,
  ConnectionContextFactory,
  ConnectionMessage,
  ConnectionOptions,
  ConnectionState,
} from './types.js';

export const DEFAULT_READY_TIMEOUT_MS = 10_000;
export const DEFAULT_LIVENESS_INTERVAL_MS = 1000;

export interface SupervisorOptions {
  /** How long `start` waits for the context to report ready or failed */
  readyTimeoutMs?: number;
  /** How often the keep-alive loop checks that the context is still running */
  livenessIntervalMs?: number;
  contextFactory?: ConnectionContextFactory;
}

type Readiness =
  | { status: 'ready' }
  | { status: 'failed'; error: StartupError }
  | { status: 'timeout' }
  | { status: 'aborted' };

/**
 * One supervised stretch of a connection context. `controller` is the run's
 * cancellation token; `settle` is set while `start` waits for readiness.
 */
interface ConnectionRun {
  context: ConnectionContext;
  controller: AbortController;
  settle: ((readiness: Readiness) => void) | null;
  ready: boolean;
}

/**
 * Resolves after `ms`, or as soon as `signal` aborts
 */
function pause(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    const done = (): void => {
      clearTimeout(timer);
      signal.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal.addEventListener('abort', done, { once: true });
  });
}

/**
 * Owns the lifecycle of the Feishu long connection.
 *
 * The connection runs in an isolated context (a worker thread by default).
 * `start` waits a bounded time for it to come up, re-raises a startup
 * failure, then polls the context until `stop` is called or the context
 * dies. `stop` only detaches: the SDK has no way to close its WebSocket, so
 * a detached worker keeps running until the process exits. The next `start`
 * reattaches to that worker while it is alive instead of opening a second
 * connection.
 */
export class ConnectionSupervisor {
  private state: ConnectionState = 'idle';
  private current: ConnectionRun | null = null;
  private dormant: ConnectionRun | null = null;
  private readonly readyTimeoutMs: number;
  private readonly livenessIntervalMs: number;
  private readonly contextFactory: ConnectionContextFactory;

  constructor(
    private readonly onEvent: (event: unknown) => void,
    options: SupervisorOptions = {}
  ) {
    this.readyTimeoutMs = options.readyTimeoutMs ?? DEFAULT_READY_TIMEOUT_MS;
    this.livenessIntervalMs = options.livenessIntervalMs ?? DEFAULT_LIVENESS_INTERVAL_MS;
    this.contextFactory = options.contextFactory ?? createWorkerContext;
  }

  getState(): ConnectionState {
    return this.state;
  }

  isActive(): boolean {
    return this.state === 'starting' || this.state === 'running';
  }

  /**
   * Launch the connection and keep it supervised.
   * Resolves when the connection is stopped or dies; rejects with a
   * StartupError if the context reports a failure while starting.
   */
  async start(options: ConnectionOptions): Promise<void> {
    if (this.isActive()) {
      logger.warn('Feishu connection already running');
      return;
    }

    this.state = 'starting';

    const previous = this.takeDormant();
    let context: ConnectionContext;
    if (previous) {
      logger.info('Reattaching to running Feishu connection');
      context = previous.context;
    } else {
      try {
        context = this.contextFactory(options);
      } catch (error) {
        this.state = 'failed';
        throw toStartupError(serializeError(error));
      }
    }

    const run: ConnectionRun = {
      context,
      controller: new AbortController(),
      settle: null,
      ready: previous?.ready ?? false,
    };
    this.current = run;

    const readiness = await this.awaitReadiness(run, previous !== null);

    switch (readiness.status) {
      case 'aborted':
        return;
      case 'failed':
        this.fail(run);
        throw readiness.error;
      case 'timeout':
        logger.warn(
          `Feishu connection not ready after ${this.readyTimeoutMs}ms, continuing without confirmation`
        );
        break;
      case 'ready':
        if (this.current === run && this.state === 'starting') {
          this.state = 'running';
        }
        logger.info('Feishu WebSocket client started successfully');
        break;
    }

    await this.keepAlive(run);
  }

  /**
   * Stop supervising the current connection. Advisory only: see the class comment.
   */
  stop(): void {
    const run = this.current;
    this.current = null;

    if (run) {
      run.controller.abort();
      run.context.detach();
      this.dormant = run;
    }

    this.state = 'stopped';
  }

  /**
   * The context left behind by the last `stop`, if it is still running
   */
  private takeDormant(): ConnectionRun | null {
    const run = this.dormant;
    this.dormant = null;

    if (run && !run.context.isAlive()) {
      logger.info('Previous Feishu connection has exited, launching a new one');
      return null;
    }
    return run;
  }

  private awaitReadiness(run: ConnectionRun, resume: boolean): Promise<Readiness> {
    return new Promise((resolve) => {
      const { signal } = run.controller;
      const onAbort = (): void => settle({ status: 'aborted' });
      const settle = (readiness: Readiness): void => {
        clearTimeout(timer);
        signal.removeEventListener('abort', onAbort);
        run.settle = null;
        resolve(readiness);
      };
      const timer = setTimeout(() => settle({ status: 'timeout' }), this.readyTimeoutMs);

      run.settle = settle;
      signal.addEventListener('abort', onAbort, { once: true });

      const listener = (message: ConnectionMessage): void => this.handleMessage(run, message);
      try {
        if (resume) {
          run.context.resume(listener);
        } else {
          run.context.start(listener);
        }
      } catch (error) {
        settle({ status: 'failed', error: toStartupError(serializeError(error)) });
        return;
      }

      // A reattached context reported ready before it was detached
      if (run.ready) {
        settle({ status: 'ready' });
      }
    });
  }

  private handleMessage(run: ConnectionRun, message: ConnectionMessage): void {
    switch (message.type) {
      case 'event':
        this.onEvent(message.event);
        return;

      case 'ready':
        run.ready = true;
        if (this.current === run && this.state === 'starting') {
          this.state = 'running';
        }
        run.settle?.({ status: 'ready' });
        return;

      case 'failed': {
        const error = toStartupError(message.error);
        if (run.settle) {
          run.settle({ status: 'failed', error });
        } else {
          logger.error('Feishu connection failed:', error);
          this.fail(run);
        }
        return;
      }
    }
  }

  private async keepAlive(run: ConnectionRun): Promise<void> {
    const { signal } = run.controller;

    while (!signal.aborted) {
      await pause(this.livenessIntervalMs, signal);
      if (signal.aborted) break;

      if (!run.context.isAlive()) {
        logger.warn('Feishu connection worker died unexpectedly');
        this.fail(run);
        break;
      }
    }
  }

  private fail(run: ConnectionRun): void {
    run.controller.abort();
    run.context.detach();

    if (this.current === run) {
      this.current = null;
      this.state = 'failed';
    }
  }
}
