import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { newDb } from 'pg-mem';
import { drizzle } from 'drizzle-orm/node-postgres';

import { CREATE_TABLES_SQL, schema } from '../../packages/main/src/db/schema';
import { createPgJobStore, type JobStore } from '../../packages/main/src/repo/jobStore';

async function createTestDb() {
  const mem = newDb();
  mem.public.none(CREATE_TABLES_SQL);
  const pg = mem.adapters.createPg();
  const client = new pg.Client();
  await client.connect();
  // drizzle passes per-query type parsers, which the in-memory client does not accept.
  const query = client.query.bind(client);
  client.query = (config: unknown, ...rest: unknown[]) => {
    if (typeof config === 'object' && config !== null && 'types' in config) {
      const { types: _types, ...withoutTypes } = config;
      return query(withoutTypes, ...rest);
    }
    return query(config, ...rest);
  };
  const db = drizzle(client, { schema });
  return { client, db };
}

const fields = {
  customer: 'Acme Foods',
  ticket: 'T-100',
  inlayType: 'UHF',
  quantity: 250,
  labelsPerRoll: 100,
  printerName: 'P1'
};

describe('PostgreSQL job store', () => {
  let client: { end: () => Promise<void> };
  let store: JobStore;

  beforeEach(async () => {
    const created = await createTestDb();
    client = created.client;
    store = createPgJobStore(created.db);
  });

  afterEach(async () => {
    await client.end();
  });

  it('adds jobs and reads them back', async () => {
    const id = await store.addJob(fields);
    const job = await store.getJob(id);

    expect(job).toMatchObject({ ...fields, id, completed: false });
    expect(typeof job?.createdAt).toBe('string');
    expect(await store.getJob(id + 100)).toBeNull();
  });

  it('splits active and completed jobs with their own ordering', async () => {
    const first = await store.addJob(fields);
    const second = await store.addJob({ ...fields, ticket: 'T-101' });
    const third = await store.addJob({ ...fields, ticket: 'T-102' });

    expect(await store.updateJobCompletion(first, true)).toBe(true);
    expect(await store.updateJobCompletion(third, true)).toBe(true);

    expect((await store.getActiveJobs()).map((job) => job.id)).toEqual([second]);
    expect((await store.getCompletedJobs()).map((job) => job.id)).toEqual([third, first]);
  });

  it('updates job fields and reports missing jobs', async () => {
    const id = await store.addJob(fields);

    expect(await store.updateJob(id, { ...fields, labelsPerRoll: 50, printerName: 'P2' })).toBe(true);
    expect(await store.getJob(id)).toMatchObject({ labelsPerRoll: 50, printerName: 'P2' });
    expect(await store.updateJob(id + 1, fields)).toBe(false);
    expect(await store.updateJobCompletion(id + 1, true)).toBe(false);
  });

  it('appends roll actions per job in insertion order', async () => {
    const id = await store.addJob(fields);
    const other = await store.addJob({ ...fields, ticket: 'T-200' });

    await store.logRollAction(id, 1, 'start');
    await store.logRollAction(other, 1, 'start');
    await store.logRollAction(id, 1, 'pause note', '[2025-03-04 09:05:07] Paused at 42: ribbon jam');
    await store.logRollAction(id, 0, 'job completed', 'Job marked as complete');

    const actions = await store.listRollActions(id);
    expect(actions.map((action) => [action.rollNumber, action.action, action.note])).toEqual([
      [1, 'start', ''],
      [1, 'pause note', '[2025-03-04 09:05:07] Paused at 42: ribbon jam'],
      [0, 'job completed', 'Job marked as complete']
    ]);
    expect(actions.every((action) => action.jobId === id)).toBe(true);
  });

  it('rejects roll actions for jobs that do not exist', async () => {
    await expect(store.logRollAction(404, 1, 'start')).rejects.toThrow();
  });
});
