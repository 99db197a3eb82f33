import { asc, eq } from 'drizzle-orm';
import type { RollAction } from '../../../shared/src';
import { withDb, type AppDb } from '../services/db';
import { rollActions } from '../db/schema';

export async function logRollAction(
  jobId: number,
  rollNumber: number,
  action: string,
  note = '',
  db?: AppDb
): Promise<void> {
  const values = {
    jobId,
    rollNumber,
    action,
    note,
    timestamp: new Date().toISOString()
  };

  if (db) {
    await db.insert(rollActions).values(values);
    return;
  }

  await withDb(async (innerDb) => {
    await innerDb.insert(rollActions).values(values);
  });
}

export async function listRollActions(jobId: number, db?: AppDb): Promise<RollAction[]> {
  const query = (inner: AppDb) =>
    inner
      .select()
      .from(rollActions)
      .where(eq(rollActions.jobId, jobId))
      .orderBy(asc(rollActions.id));
  const rows = db ? await query(db) : await withDb(query);

  return rows.map((row) => ({
    id: Number(row.id),
    jobId: row.jobId,
    rollNumber: row.rollNumber,
    action: row.action,
    note: row.note,
    timestamp: row.timestamp
  }));
}
