import { describe, it, expect, beforeAll, afterAll } from '@jest/globals';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { WorkerHandle } from '../WorkerHandle.js';
import type { ConnectionMessage, ConnectionOptions } from '../types.js';
import { waitFor } from './FakeContext.js';

const options: ConnectionOptions = {
  appId: 'cli_test',
  appSecret: 'test-secret',
  domain: 'feishu',
  logLevel: 'info',
};

// Plain CommonJS scripts stand in for the compiled connection worker
const scripts = {
  posting: `
const { parentPort, workerData } = require('worker_threads');
parentPort.postMessage({ type: 'ready' });
parentPort.postMessage({ type: 'event', event: { appId: workerData.appId } });
parentPort.postMessage('not a connection message');
`,
  throwing: `
throw new Error('worker blew up');
`,
  ticking: `
const { parentPort } = require('worker_threads');
let tick = 0;
const timer = setInterval(() => {
  tick += 1;
  parentPort.postMessage({ type: 'event', event: { tick } });
  if (tick === 20) clearInterval(timer);
}, 15);
`,
};

describe('WorkerHandle', () => {
  let dir: string;

  beforeAll(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'feishu-worker-'));
    for (const [name, source] of Object.entries(scripts)) {
      fs.writeFileSync(path.join(dir, `${name}.js`), source);
    }
  });

  afterAll(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('forwards connection messages and reports when the worker exits', async () => {
    const received: ConnectionMessage[] = [];
    const handle = new WorkerHandle(options, path.join(dir, 'posting.js'));

    handle.start((message) => received.push(message));
    expect(handle.isAlive()).toBe(true);

    await waitFor(() => received.length === 2, 5000);
    await waitFor(() => !handle.isAlive(), 5000);

    expect(received).toEqual([
      { type: 'ready' },
      { type: 'event', event: { appId: 'cli_test' } },
    ]);
  });

  it('reports an uncaught worker error as a failure', async () => {
    const received: ConnectionMessage[] = [];
    const handle = new WorkerHandle(options, path.join(dir, 'throwing.js'));

    handle.start((message) => received.push(message));

    await waitFor(() => received.length === 1, 5000);
    expect(received[0]).toMatchObject({ type: 'failed', error: { message: 'worker blew up' } });

    await waitFor(() => !handle.isAlive(), 5000);
  });

  it('delivers to a new listener after detach and resume', async () => {
    const before: ConnectionMessage[] = [];
    const after: ConnectionMessage[] = [];
    const handle = new WorkerHandle(options, path.join(dir, 'ticking.js'));

    handle.start((message) => before.push(message));
    await waitFor(() => before.length >= 1, 5000);

    handle.detach();
    const seenBeforeResume = before.length;
    handle.resume((message) => after.push(message));

    await waitFor(() => after.length >= 1, 5000);
    expect(before).toHaveLength(seenBeforeResume);
    expect(after[0]).toMatchObject({ type: 'event' });

    await waitFor(() => !handle.isAlive(), 5000);
  });

  it('refuses to resume before it has started', () => {
    const handle = new WorkerHandle(options, path.join(dir, 'posting.js'));
    expect(() => handle.resume(() => {})).toThrow('Worker not started');
  });

  it('refuses to start twice', async () => {
    const handle = new WorkerHandle(options, path.join(dir, 'posting.js'));
    handle.start(() => {});

    expect(() => handle.start(() => {})).toThrow('Worker already started');

    handle.detach();
    await waitFor(() => !handle.isAlive(), 5000);
  });
});
