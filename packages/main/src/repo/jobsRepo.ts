import { asc, desc, eq } from 'drizzle-orm';
import type { Job, JobFields } from '../../../shared/src';
import { withDb, type AppDb } from '../services/db';
import { jobs } from '../db/schema';

type JobRow = typeof jobs.$inferSelect;

function toJob(row: JobRow): Job {
  return {
    id: row.id,
    customer: row.customer,
    ticket: row.ticket,
    inlayType: row.inlayType,
    quantity: row.quantity,
    labelsPerRoll: row.labelsPerRoll,
    printerName: row.printerName,
    createdAt: row.createdAt,
    completed: row.completed
  };
}

function run<T>(db: AppDb | undefined, fn: (db: AppDb) => Promise<T>): Promise<T> {
  return db ? fn(db) : withDb(fn);
}

export async function addJob(fields: JobFields, db?: AppDb): Promise<number> {
  const rows = await run(db, (inner) =>
    inner
      .insert(jobs)
      .values({
        customer: fields.customer,
        ticket: fields.ticket,
        inlayType: fields.inlayType,
        quantity: fields.quantity,
        labelsPerRoll: fields.labelsPerRoll,
        printerName: fields.printerName,
        createdAt: new Date().toISOString()
      })
      .returning({ id: jobs.id })
  );
  const inserted = rows[0];
  if (!inserted) {
    throw new Error('Insert into jobs returned no id');
  }
  return inserted.id;
}

export async function getJob(id: number, db?: AppDb): Promise<Job | null> {
  const rows = await run(db, (inner) => inner.select().from(jobs).where(eq(jobs.id, id)));
  return rows[0] ? toJob(rows[0]) : null;
}

export async function getActiveJobs(db?: AppDb): Promise<Job[]> {
  const rows = await run(db, (inner) =>
    inner.select().from(jobs).where(eq(jobs.completed, false)).orderBy(asc(jobs.id))
  );
  return rows.map(toJob);
}

export async function getCompletedJobs(db?: AppDb): Promise<Job[]> {
  const rows = await run(db, (inner) =>
    inner.select().from(jobs).where(eq(jobs.completed, true)).orderBy(desc(jobs.id))
  );
  return rows.map(toJob);
}

export async function updateJob(id: number, fields: JobFields, db?: AppDb): Promise<boolean> {
  const rows = await run(db, (inner) =>
    inner
      .update(jobs)
      .set({
        customer: fields.customer,
        ticket: fields.ticket,
        inlayType: fields.inlayType,
        quantity: fields.quantity,
        labelsPerRoll: fields.labelsPerRoll,
        printerName: fields.printerName
      })
      .where(eq(jobs.id, id))
      .returning({ id: jobs.id })
  );
  return rows.length > 0;
}

export async function updateJobCompletion(id: number, completed: boolean, db?: AppDb): Promise<boolean> {
  const rows = await run(db, (inner) =>
    inner.update(jobs).set({ completed }).where(eq(jobs.id, id)).returning({ id: jobs.id })
  );
  return rows.length > 0;
}
