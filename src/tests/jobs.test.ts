import assert from 'assert';
import { describe, test } from 'node:test';
import { DRAFTED_REPLY_COUNTER, incrementCounter, readCounter } from '../core/repositories/counters';
import {
    claimJob,
    getJobById,
    getJobStatusCounts,
    insertJob,
    listQueuedJobs,
    markJobFailed,
    markJobSucceeded,
    recoverStuckJobs,
    requeueJob,
} from '../core/repositories/jobs';
import { insertLead } from '../core/repositories/leads';
import { createTestDatabase, START_TIME } from './helpers';

const minutesAfterStart = (minutes: number): Date => new Date(Date.parse(START_TIME) + minutes * 60_000);

describe('coda job', () => {
    test('claim atomico: il secondo worker perde la corsa', async () => {
        const db = await createTestDatabase();
        const lead = await insertLead(db, { companyName: 'Shop Co' }, START_TIME);
        const jobId = await insertJob(db, 'lead_research', lead.id, START_TIME);

        const [first, second] = await Promise.all([
            claimJob(db, jobId, 'worker-a', START_TIME),
            claimJob(db, jobId, 'worker-b', START_TIME),
        ]);
        assert.equal(first?.locked_by, 'worker-a');
        assert.equal(first?.status, 'running');
        assert.equal(first?.attempts, 1);
        assert.equal(second, null);
        assert.deepEqual(await listQueuedJobs(db, 'lead_research'), []);
        await db.close();
    });

    test('esiti e conteggi per stato', async () => {
        const db = await createTestDatabase();
        const lead = await insertLead(db, { companyName: 'Shop Co' }, START_TIME);
        const ok = await insertJob(db, 'lead_research', lead.id, START_TIME);
        const ko = await insertJob(db, 'lead_research', lead.id, START_TIME);
        await insertJob(db, 'lead_research', lead.id, START_TIME);

        await claimJob(db, ok, 'worker-a', START_TIME);
        await markJobSucceeded(db, ok, START_TIME);
        await claimJob(db, ko, 'worker-a', START_TIME);
        await markJobFailed(db, ko, 'lint_failed: item_cap_exceeded:4>3', START_TIME);

        assert.deepEqual(await getJobStatusCounts(db), { queued: 1, running: 0, succeeded: 1, failed: 1 });
        const failed = await getJobById(db, ko);
        assert.equal(failed?.last_error, 'lint_failed: item_cap_exceeded:4>3');
        assert.equal(failed?.locked_by, null);
        assert.equal(failed?.completed_at, START_TIME);
        await db.close();
    });

    test('job bloccati oltre la soglia tornano in coda', async () => {
        const db = await createTestDatabase();
        const lead = await insertLead(db, { companyName: 'Shop Co' }, START_TIME);
        const jobId = await insertJob(db, 'lead_research', lead.id, START_TIME);
        await claimJob(db, jobId, 'worker-dead', START_TIME);

        assert.equal(await recoverStuckJobs(db, 30, minutesAfterStart(10)), 0);
        assert.equal(await recoverStuckJobs(db, 30, minutesAfterStart(31)), 1);

        const job = await getJobById(db, jobId);
        assert.equal(job?.status, 'queued');
        assert.equal(job?.locked_by, null);
        assert.equal(job?.last_error, 'Recovered from running on startup');
        assert.equal(job?.attempts, 1);
        await db.close();
    });

    test('requeue solo da running', async () => {
        const db = await createTestDatabase();
        const lead = await insertLead(db, { companyName: 'Shop Co' }, START_TIME);
        const jobId = await insertJob(db, 'lead_research', lead.id, START_TIME);

        await requeueJob(db, jobId, 'interrupted', START_TIME);
        assert.equal((await getJobById(db, jobId))?.last_error, null);

        await claimJob(db, jobId, 'worker-a', START_TIME);
        await requeueJob(db, jobId, 'interrupted', START_TIME);
        const job = await getJobById(db, jobId);
        assert.equal(job?.status, 'queued');
        assert.equal(job?.last_error, 'interrupted');
        await db.close();
    });
});

describe('contatori', () => {
    test('incremento atomico a partire da zero', async () => {
        const db = await createTestDatabase();
        assert.equal(await readCounter(db, DRAFTED_REPLY_COUNTER), 0);
        assert.equal(await incrementCounter(db, DRAFTED_REPLY_COUNTER), 1);
        assert.equal(await incrementCounter(db, DRAFTED_REPLY_COUNTER), 2);
        assert.equal(await readCounter(db, DRAFTED_REPLY_COUNTER), 2);
        assert.equal(await readCounter(db, 'other'), 0);
        await db.close();
    });
});
