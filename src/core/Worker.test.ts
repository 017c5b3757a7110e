import assert from 'node:assert/strict';
import test from 'node:test';
import { silentLogger } from '../lib/logger';
import { Queue } from './Queue';
import { SqliteJobStore } from './SqliteJobStore';
import { JobHandler } from './types';
import { Worker } from './Worker';
import { WorkerCoordinator } from './WorkerCoordinator';
import { LocalTransport } from './WorkerTransport';

const HOUR = 60 * 60 * 1000;

function setup(handler: JobHandler<string>, concurrency = 1) {
  const store = new SqliteJobStore();
  const queue = new Queue<string>(store, { backoff: { baseMs: 0, maxMs: 0 } }, silentLogger);
  const coordinator = new WorkerCoordinator<string>(store, queue, { heartbeatIntervalMs: 1000 }, silentLogger);
  const worker = new Worker<string>(
    new LocalTransport(queue, coordinator),
    handler,
    {
      id: 'worker-a',
      concurrency,
      leaseMs: 10_000,
      pollIntervalMs: HOUR,
      heartbeatIntervalMs: HOUR,
      supervisor: { timeoutMs: 5000, graceMs: 50 },
    },
    silentLogger
  );
  return { store, queue, coordinator, worker };
}

test('each concurrency slot registers as its own worker', async () => {
  const { coordinator, worker } = setup(async () => 'ok', 2);
  assert.deepEqual(worker.slotIds, ['worker-a:0', 'worker-a:1']);

  await worker.start();
  assert.equal(worker.getState(), 'running');
  assert.deepEqual(coordinator.listLiveWorkers(), new Set(['worker-a:0', 'worker-a:1']));

  await worker.drain();
  assert.equal(worker.getState(), 'stopped');
  assert.deepEqual(coordinator.listWorkers(), []);
});

test('a tick runs at most one job per slot', async () => {
  const seen: string[] = [];
  const { queue, worker } = setup(async (payload) => {
    seen.push(payload);
    return payload.toUpperCase();
  }, 2);
  const jobs = ['a', 'b', 'c'].map((payload) => queue.enqueue(payload));

  await worker.start();
  await worker.tick();
  assert.deepEqual([...seen].sort(), ['a', 'b']);

  await worker.tick();
  assert.deepEqual([...seen].sort(), ['a', 'b', 'c']);
  assert.deepEqual(
    jobs.map((job) => queue.getJob(job.id)?.state),
    ['completed', 'completed', 'completed']
  );

  await worker.drain();
});

test('finished attempts are emitted with their records', async () => {
  const { queue, worker } = setup(async () => {
    throw new Error('nope');
  });
  const outcomes: string[] = [];
  worker.on('job:finished', (record, slotId) => outcomes.push(`${slotId}:${record.outcome}:${record.error}`));
  queue.enqueue('x');

  await worker.start();
  await worker.tick();
  await worker.drain();

  assert.deepEqual(outcomes, ['worker-a:failure:nope']);
});

test('a slot that was marked dead registers again and carries on', async () => {
  const { store, queue, worker } = setup(async () => 'ok');
  await worker.start();

  const registered = store.loadWorker('worker-a');
  assert.ok(registered);
  store.saveWorker({ ...registered, status: 'dead' });
  const job = queue.enqueue('late');

  await worker.tick();
  assert.equal(store.loadWorker('worker-a')?.status, 'idle');
  assert.equal(queue.getJob(job.id)?.state, 'waiting');

  await worker.tick();
  assert.equal(queue.getJob(job.id)?.state, 'completed');
  await worker.drain();
});

test('heartbeat re-registers a slot the coordinator dropped', async () => {
  const { store, worker } = setup(async () => 'ok');
  await worker.start();
  store.deleteWorker('worker-a');

  await worker.heartbeat();
  assert.equal(store.loadWorker('worker-a')?.status, 'idle');
  await worker.drain();
});

test('a draining worker stops claiming', async () => {
  const { queue, worker } = setup(async () => 'ok');
  await worker.start();
  await worker.drain();

  const job = queue.enqueue('after-drain');
  await worker.tick();
  assert.equal(worker.isAccepting(), false);
  assert.equal(queue.getJob(job.id)?.state, 'waiting');
});
