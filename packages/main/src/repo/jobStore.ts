import type { Job, JobFields, RollAction } from '../../../shared/src';
import type { AppDb } from '../services/db';
import {
  addJob,
  getActiveJobs,
  getCompletedJobs,
  getJob,
  updateJob,
  updateJobCompletion
} from './jobsRepo';
import { listRollActions, logRollAction } from './rollActionsRepo';

/** Durable home of jobs and the append-only roll history. */
export interface JobStore {
  addJob(fields: JobFields): Promise<number>;
  getJob(id: number): Promise<Job | null>;
  getActiveJobs(): Promise<Job[]>;
  getCompletedJobs(): Promise<Job[]>;
  updateJob(id: number, fields: JobFields): Promise<boolean>;
  updateJobCompletion(id: number, completed: boolean): Promise<boolean>;
  logRollAction(jobId: number, rollNumber: number, action: string, note?: string): Promise<void>;
  listRollActions(jobId: number): Promise<RollAction[]>;
}

/** PostgreSQL-backed store. Without `db` every call checks a client out of the shared pool. */
export function createPgJobStore(db?: AppDb): JobStore {
  return {
    addJob: (fields) => addJob(fields, db),
    getJob: (id) => getJob(id, db),
    getActiveJobs: () => getActiveJobs(db),
    getCompletedJobs: () => getCompletedJobs(db),
    updateJob: (id, fields) => updateJob(id, fields, db),
    updateJobCompletion: (id, completed) => updateJobCompletion(id, completed, db),
    logRollAction: (jobId, rollNumber, action, note = '') => logRollAction(jobId, rollNumber, action, note, db),
    listRollActions: (jobId) => listRollActions(jobId, db)
  };
}
