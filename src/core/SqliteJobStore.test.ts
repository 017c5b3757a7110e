import assert from 'node:assert/strict';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import test from 'node:test';
import { SqliteJobStore } from './SqliteJobStore';
import { ExecutionRecord, Job } from './types';

function sampleJob(overrides: Partial<Job> = {}): Job {
  return {
    id: 'job-1',
    payload: { to: 'ops@example.com', tags: ['a', 'b'] },
    state: 'waiting',
    attempts: 0,
    maxAttempts: 3,
    enqueuedAt: 1000,
    availableAt: 1000,
    updatedAt: 1000,
    ...overrides,
  };
}

function sampleRecord(overrides: Partial<ExecutionRecord> = {}): ExecutionRecord {
  return {
    jobId: 'job-1',
    attempt: 1,
    workerId: 'w1',
    startedAt: 100,
    finishedAt: 150,
    outcome: 'failure',
    error: 'boom',
    ...overrides,
  };
}

test('a persisted job loads back unchanged after the store is reopened', () => {
  const dir = mkdtempSync(join(tmpdir(), 'relay-store-'));
  const path = join(dir, 'queue.db');
  const job = sampleJob({
    state: 'active',
    attempts: 1,
    lease: { jobId: 'job-1', workerId: 'w1', claimedAt: 2000, expiresAt: 5000 },
    lastError: 'lease expired',
    updatedAt: 2000,
  });

  try {
    const first = new SqliteJobStore({ path });
    first.persistJob(job);
    first.close();

    const second = new SqliteJobStore({ path });
    assert.deepEqual(second.loadJob('job-1'), job);
    second.close();
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
});

test('loadJob returns undefined for an unknown id', () => {
  const store = new SqliteJobStore();
  assert.equal(store.loadJob('missing'), undefined);
  store.close();
});

test('execution records are append-only per job and attempt', () => {
  const store = new SqliteJobStore();
  store.appendRecord(sampleRecord());

  assert.throws(() => store.appendRecord(sampleRecord({ error: 'again' })), /UNIQUE constraint failed/);
  assert.deepEqual(store.listRecords({ jobId: 'job-1' }), [sampleRecord()]);
  store.close();
});

test('record results round-trip as JSON', () => {
  const store = new SqliteJobStore();
  const record = sampleRecord({ outcome: 'success', error: undefined, result: { sent: 2 } });
  store.appendRecord(record);

  assert.deepEqual(store.listRecords(), [
    { jobId: 'job-1', attempt: 1, workerId: 'w1', startedAt: 100, finishedAt: 150, outcome: 'success', result: { sent: 2 } },
  ]);
  store.close();
});

test('claimNext hands a waiting job to exactly one caller', () => {
  const store = new SqliteJobStore();
  store.persistJob(sampleJob());

  const first = store.claimNext('w1', 2000, 3000);
  const second = store.claimNext('w2', 2000, 3000);

  assert.equal(first?.state, 'active');
  assert.deepEqual(first?.lease, { jobId: 'job-1', workerId: 'w1', claimedAt: 2000, expiresAt: 3000 });
  assert.equal(second, undefined);
  store.close();
});

test('claimNext takes the oldest eligible job first', () => {
  const store = new SqliteJobStore();
  store.persistJob(sampleJob({ id: 'late', enqueuedAt: 1500, availableAt: 1500 }));
  store.persistJob(sampleJob({ id: 'early', enqueuedAt: 1000, availableAt: 1000 }));
  store.persistJob(sampleJob({ id: 'future', availableAt: 9000 }));

  assert.equal(store.claimNext('w1', 2000, 3000)?.id, 'early');
  assert.equal(store.claimNext('w1', 2000, 3000)?.id, 'late');
  assert.equal(store.claimNext('w1', 2000, 3000), undefined);
  store.close();
});

test('transition only writes while the guard holds', () => {
  const store = new SqliteJobStore();
  store.persistJob(sampleJob());
  const active = store.claimNext('w1', 2000, 3000);
  assert.ok(active);

  const completed: Job = { ...active, state: 'completed', attempts: 1, lease: undefined, updatedAt: 2500 };
  assert.equal(store.transition(completed, { state: 'waiting' }), undefined);
  assert.equal(store.transition(completed, { state: 'active', workerId: 'w2' }), undefined);

  const stored = store.transition(completed, { state: 'active', workerId: 'w1' });
  assert.equal(stored?.state, 'completed');
  assert.equal(stored?.lease, undefined);
  assert.equal(store.loadJob('job-1')?.state, 'completed');
  store.close();
});

test('promoteDue moves only delayed jobs whose time has come', () => {
  const store = new SqliteJobStore();
  store.persistJob(sampleJob({ id: 'due', state: 'delayed', availableAt: 2000 }));
  store.persistJob(sampleJob({ id: 'later', state: 'delayed', availableAt: 5000 }));

  assert.deepEqual(store.promoteDue(2000), ['due']);
  assert.equal(store.loadJob('due')?.state, 'waiting');
  assert.equal(store.loadJob('later')?.state, 'delayed');
  store.close();
});

test('countByState reports every state', () => {
  const store = new SqliteJobStore();
  store.persistJob(sampleJob({ id: 'a' }));
  store.persistJob(sampleJob({ id: 'b' }));
  store.persistJob(sampleJob({ id: 'c', state: 'failed' }));

  assert.deepEqual(store.countByState(), { waiting: 2, active: 0, completed: 0, failed: 1, delayed: 0 });
  store.close();
});

test('listJobs filters by state and enqueue time', () => {
  const store = new SqliteJobStore();
  store.persistJob(sampleJob({ id: 'a', enqueuedAt: 100 }));
  store.persistJob(sampleJob({ id: 'b', enqueuedAt: 200 }));
  store.persistJob(sampleJob({ id: 'c', enqueuedAt: 300, state: 'completed' }));

  assert.deepEqual(store.listJobs({ state: 'waiting' }).map((job) => job.id), ['a', 'b']);
  assert.deepEqual(store.listJobs({ from: 200 }).map((job) => job.id), ['b', 'c']);
  assert.deepEqual(store.listJobs({ from: 100, to: 300 }).map((job) => job.id), ['a', 'b']);
  assert.deepEqual(store.listJobs({ limit: 1 }).map((job) => job.id), ['a']);
  store.close();
});

test('listRecords filters by job and finish time, newest first', () => {
  const store = new SqliteJobStore();
  store.appendRecord(sampleRecord({ jobId: 'a', attempt: 1, finishedAt: 100 }));
  store.appendRecord(sampleRecord({ jobId: 'a', attempt: 2, finishedAt: 200 }));
  store.appendRecord(sampleRecord({ jobId: 'b', attempt: 1, finishedAt: 300 }));

  assert.deepEqual(
    store.listRecords().map((record) => `${record.jobId}#${record.attempt}`),
    ['b#1', 'a#2', 'a#1']
  );
  assert.deepEqual(
    store.listRecords({ jobId: 'a' }).map((record) => record.attempt),
    [2, 1]
  );
  assert.deepEqual(
    store.listRecords({ from: 150, to: 300 }).map((record) => `${record.jobId}#${record.attempt}`),
    ['a#2']
  );
  store.close();
});

test('deleteFinishedBefore removes old terminal jobs and their history', () => {
  const store = new SqliteJobStore();
  store.persistJob(sampleJob({ id: 'old', state: 'completed', updatedAt: 100 }));
  store.persistJob(sampleJob({ id: 'recent', state: 'failed', updatedAt: 900 }));
  store.persistJob(sampleJob({ id: 'pending', updatedAt: 100 }));
  store.appendRecord(sampleRecord({ jobId: 'old' }));

  assert.equal(store.deleteFinishedBefore(500), 1);
  assert.equal(store.loadJob('old'), undefined);
  assert.deepEqual(store.listRecords({ jobId: 'old' }), []);
  assert.equal(store.loadJob('recent')?.state, 'failed');
  assert.equal(store.loadJob('pending')?.state, 'waiting');
  store.close();
});

test('workers are saved, listed and deleted', () => {
  const store = new SqliteJobStore();
  store.saveWorker({ id: 'w1', status: 'idle', registeredAt: 10, lastHeartbeatAt: 10 });
  store.saveWorker({ id: 'w1', status: 'busy', registeredAt: 10, lastHeartbeatAt: 20 });
  store.saveWorker({ id: 'w2', status: 'dead', registeredAt: 15, lastHeartbeatAt: 15 });

  assert.deepEqual(store.loadWorker('w1'), { id: 'w1', status: 'busy', registeredAt: 10, lastHeartbeatAt: 20 });
  assert.deepEqual(store.listWorkers().map((worker) => worker.id), ['w1', 'w2']);
  assert.equal(store.deleteWorker('w2'), true);
  assert.equal(store.deleteWorker('w2'), false);
  assert.equal(store.ping(), true);
  store.close();
});
