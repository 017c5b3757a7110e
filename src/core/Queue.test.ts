import assert from 'node:assert/strict';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import test from 'node:test';
import { silentLogger } from '../lib/logger';
import { InvalidStateError, LeaseExpiredError, NotOwnerError, TerminalFailureError, ValidationError } from './errors';
import { JobStore } from './JobStore';
import { Queue } from './Queue';
import { SqliteJobStore } from './SqliteJobStore';
import { QueueOptions } from './types';

interface Payload {
  task: string;
}

function createClock(start = 1_000_000) {
  let current = start;
  return {
    now: () => current,
    advance: (ms: number) => {
      current += ms;
    },
  };
}

function createQueue(
  clock = createClock(),
  store: JobStore = new SqliteJobStore(),
  options: QueueOptions = {}
) {
  const queue = new Queue<Payload>(
    store,
    { now: clock.now, backoff: { baseMs: 0, maxMs: 0 }, random: () => 0.5, ...options },
    silentLogger
  );
  return { queue, store, clock };
}

test('enqueue persists a waiting job with no attempts used', () => {
  const { queue, store, clock } = createQueue();
  const job = queue.enqueue({ task: 'send-report' });

  assert.equal(job.state, 'waiting');
  assert.equal(job.attempts, 0);
  assert.equal(job.maxAttempts, 3);
  assert.equal(job.enqueuedAt, clock.now());
  assert.deepEqual(store.loadJob(job.id), job);
});

test('enqueue rejects an attempt budget below one', () => {
  const { queue } = createQueue();
  assert.throws(() => queue.enqueue({ task: 'x' }, { maxAttempts: 0 }), ValidationError);
  assert.throws(() => queue.enqueue({ task: 'x' }, { delayMs: -1 }), ValidationError);
});

test('only one of two racing claims receives a waiting job', () => {
  const { queue, clock } = createQueue();
  const job = queue.enqueue({ task: 'only-once' });

  const first = queue.claim('w1', 1000);
  const second = queue.claim('w2', 1000);

  assert.equal(second, null);
  assert.equal(first?.id, job.id);
  assert.equal(first?.state, 'active');
  assert.deepEqual(first?.lease, { jobId: job.id, workerId: 'w1', claimedAt: clock.now(), expiresAt: clock.now() + 1000 });
});

test('two connections to the same database never claim the same job', () => {
  const dir = mkdtempSync(join(tmpdir(), 'relay-queue-'));
  const path = join(dir, 'queue.db');
  const clock = createClock();
  const storeA = new SqliteJobStore({ path });
  const storeB = new SqliteJobStore({ path });

  try {
    const { queue: queueA } = createQueue(clock, storeA);
    const { queue: queueB } = createQueue(clock, storeB);
    for (let i = 0; i < 20; i++) {
      queueA.enqueue({ task: `t${i}` });
    }

    const claimed: string[] = [];
    for (let i = 0; i < 25; i++) {
      const job = i % 2 === 0 ? queueA.claim('wa', 1000) : queueB.claim('wb', 1000);
      if (job) claimed.push(job.id);
    }

    assert.equal(claimed.length, 20);
    assert.equal(new Set(claimed).size, 20);
  } finally {
    storeA.close();
    storeB.close();
    rmSync(dir, { recursive: true, force: true });
  }
});

test('a delayed job cannot be claimed until its delay has elapsed', () => {
  const { queue, clock } = createQueue();
  const job = queue.enqueue({ task: 'later' }, { delayMs: 60_000 });
  assert.equal(job.state, 'delayed');

  clock.advance(59_999);
  assert.equal(queue.claim('w1', 1000), null);

  clock.advance(1);
  assert.equal(queue.claim('w1', 1000)?.id, job.id);
});

test('the sweep promotes due delayed jobs to waiting', () => {
  const { queue, clock } = createQueue();
  const job = queue.enqueue({ task: 'later' }, { delayMs: 500 });

  assert.deepEqual(queue.promoteDelayed(), []);
  clock.advance(500);
  assert.deepEqual(queue.promoteDelayed(), [job.id]);
  assert.equal(queue.getJob(job.id)?.state, 'waiting');
});

test('a job failing on every attempt ends failed with one failure record per attempt', () => {
  const { queue, store, clock } = createQueue();
  const failures: string[] = [];
  queue.on('job:failed', (job) => failures.push(job.id));
  const job = queue.enqueue({ task: 'flaky' }, { maxAttempts: 3 });

  const decisions: string[] = [];
  for (let i = 0; i < 3; i++) {
    const claimed = queue.claim('w1', 1000);
    assert.equal(claimed?.id, job.id);
    clock.advance(10);
    const result = queue.nack(job.id, 'w1', `boom ${i + 1}`);
    assert.equal(result.ok, true);
    if (result.ok) decisions.push(result.decision.kind);
  }

  assert.deepEqual(decisions, ['retry', 'retry', 'failed']);
  const stored = queue.getJob(job.id);
  assert.equal(stored?.state, 'failed');
  assert.equal(stored?.attempts, 3);
  assert.equal(stored?.lastError, 'boom 3');
  assert.deepEqual(failures, [job.id]);

  const records = store.listRecords({ jobId: job.id });
  assert.deepEqual(
    records.map((record) => [record.attempt, record.outcome, record.error]),
    [
      [3, 'failure', 'boom 3'],
      [2, 'failure', 'boom 2'],
      [1, 'failure', 'boom 1'],
    ]
  );

  assert.equal(queue.claim('w1', 1000), null);
});

test('the terminal decision carries the attempt history summary', () => {
  const { queue } = createQueue();
  const job = queue.enqueue({ task: 'once' }, { maxAttempts: 1 });
  queue.claim('w1', 1000);

  const result = queue.nack(job.id, 'w1', 'disk full');
  assert.ok(result.ok);
  assert.equal(result.decision.kind, 'failed');
  if (result.decision.kind === 'failed') {
    assert.ok(result.decision.error instanceof TerminalFailureError);
    assert.equal(result.decision.error.message, `Job ${job.id} failed after 1 attempts: disk full`);
  }
});

test('a nacked job waits out its backoff before it can be claimed again', () => {
  const { queue, clock } = createQueue(createClock(), new SqliteJobStore(), {
    backoff: { baseMs: 1000, maxMs: 60_000 },
  });
  const job = queue.enqueue({ task: 'retry-me' });
  queue.claim('w1', 1000);

  const result = queue.nack(job.id, 'w1', 'temporary');
  assert.ok(result.ok);
  assert.deepEqual(result.decision.kind === 'retry' ? result.decision.delayMs : null, 2000);
  assert.equal(queue.getJob(job.id)?.state, 'delayed');

  assert.equal(queue.claim('w2', 1000), null);
  clock.advance(2000);
  assert.equal(queue.claim('w2', 1000)?.id, job.id);
});

test('an expired lease is reclaimed once and the attempt is counted once', () => {
  const { queue, store, clock } = createQueue();
  const job = queue.enqueue({ task: 'crashy' });
  const claimedAt = clock.now();
  queue.claim('w1', 1000);

  clock.advance(999);
  assert.deepEqual(queue.reapExpired(), []);

  clock.advance(1);
  const reclaimed = queue.reapExpired();
  assert.deepEqual(reclaimed.map((j) => [j.id, j.state, j.attempts]), [[job.id, 'waiting', 1]]);
  assert.deepEqual(queue.reapExpired(), []);

  assert.deepEqual(store.listRecords({ jobId: job.id }), [
    {
      jobId: job.id,
      attempt: 1,
      workerId: 'w1',
      startedAt: claimedAt,
      finishedAt: clock.now(),
      outcome: 'timeout',
      error: 'lease expired',
    },
  ]);

  const again = queue.claim('w2', 1000);
  assert.equal(again?.id, job.id);
  assert.equal(again?.attempts, 1);
});

test('a reclaim on the last attempt fails the job instead of requeueing it', () => {
  const { queue, clock } = createQueue();
  const job = queue.enqueue({ task: 'crashy' }, { maxAttempts: 1 });
  queue.claim('w1', 1000);
  clock.advance(1000);

  const [reclaimed] = queue.reapExpired();
  assert.equal(reclaimed.state, 'failed');
  assert.equal(queue.getJob(job.id)?.state, 'failed');
  assert.equal(queue.claim('w2', 1000), null);
});

test('ack is refused to non-owners and to owners whose lease expired', () => {
  const { queue, clock } = createQueue();
  const job = queue.enqueue({ task: 'owned' });
  queue.claim('w1', 1000);

  const stranger = queue.ack(job.id, 'w2');
  assert.equal(stranger.ok, false);
  assert.ok(!stranger.ok && stranger.error instanceof NotOwnerError);

  clock.advance(1000);
  const late = queue.ack(job.id, 'w1');
  assert.ok(!late.ok && late.error instanceof LeaseExpiredError);

  queue.reapExpired();
  const afterReap = queue.ack(job.id, 'w1');
  assert.ok(!afterReap.ok && afterReap.error instanceof NotOwnerError);
});

test('extending a lease keeps the job away from the reaper', () => {
  const { queue, store, clock } = createQueue();
  const job = queue.enqueue({ task: 'long' });
  const claimedAt = clock.now();
  queue.claim('w1', 1000);

  clock.advance(900);
  const extended = queue.extendLease(job.id, 'w1', 1000);
  assert.ok(extended.ok);
  assert.equal(extended.job.lease?.expiresAt, clock.now() + 1000);

  clock.advance(500);
  assert.deepEqual(queue.reapExpired(), []);

  const acked = queue.ack(job.id, 'w1', { rows: 12 });
  assert.ok(acked.ok);
  assert.equal(acked.job.state, 'completed');
  assert.equal(acked.job.attempts, 1);
  assert.deepEqual(store.listRecords({ jobId: job.id }), [
    {
      jobId: job.id,
      attempt: 1,
      workerId: 'w1',
      startedAt: claimedAt,
      finishedAt: clock.now(),
      outcome: 'success',
      result: { rows: 12 },
    },
  ]);
  assert.equal(queue.claim('w1', 1000), null);
});

test('revokeLeases returns every job of a worker regardless of expiry', () => {
  const { queue } = createQueue();
  const a = queue.enqueue({ task: 'a' });
  const b = queue.enqueue({ task: 'b' });
  const c = queue.enqueue({ task: 'c' });
  queue.claim('w1', 60_000);
  queue.claim('w1', 60_000);
  queue.claim('w2', 60_000);

  const revoked = queue.revokeLeases('w1');
  assert.deepEqual(revoked.map((job) => job.id).sort(), [a.id, b.id].sort());
  assert.equal(queue.getJob(a.id)?.lastError, 'worker w1 lost');
  assert.equal(queue.getJob(c.id)?.state, 'active');
});

test('only failed jobs can be re-enqueued by hand', () => {
  const { queue } = createQueue();
  const job = queue.enqueue({ task: 'manual' }, { maxAttempts: 1 });
  assert.throws(() => queue.retry(job.id), InvalidStateError);

  queue.claim('w1', 1000);
  queue.nack(job.id, 'w1', 'nope');

  const copy = queue.retry(job.id);
  assert.notEqual(copy.id, job.id);
  assert.deepEqual(copy.payload, { task: 'manual' });
  assert.equal(copy.state, 'waiting');
  assert.equal(copy.attempts, 0);
  assert.equal(copy.maxAttempts, 1);
  assert.equal(queue.getJob(job.id)?.state, 'failed');
});

test('recover requeues jobs left active by a crashed process', () => {
  const dir = mkdtempSync(join(tmpdir(), 'relay-recover-'));
  const path = join(dir, 'queue.db');
  const clock = createClock();

  try {
    const before = createQueue(clock, new SqliteJobStore({ path }));
    const job = before.queue.enqueue({ task: 'survive' });
    before.queue.claim('w1', 1000);
    before.store.close();

    clock.advance(1000);
    const after = createQueue(clock, new SqliteJobStore({ path }));
    const recovered = after.queue.recover();

    assert.deepEqual(recovered.map((j) => j.id), [job.id]);
    const stored = after.queue.getJob(job.id);
    assert.equal(stored?.state, 'waiting');
    assert.equal(stored?.attempts, 1);
    assert.equal(stored?.lastError, 'lease expired');
    assert.deepEqual(stored?.payload, { task: 'survive' });
    after.store.close();
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
});

test('cleanup drops finished jobs older than the cut-off', () => {
  const { queue, store, clock } = createQueue();
  const done = queue.enqueue({ task: 'done' });
  queue.claim('w1', 1000);
  queue.ack(done.id, 'w1');
  const pending = queue.enqueue({ task: 'pending' });

  clock.advance(10_000);
  assert.equal(queue.cleanup(5000), 1);
  assert.equal(queue.getJob(done.id), undefined);
  assert.deepEqual(store.listRecords({ jobId: done.id }), []);
  assert.equal(queue.getJob(pending.id)?.state, 'waiting');
});
