import { bigserial, boolean, integer, pgTable, serial, text } from 'drizzle-orm/pg-core';

// Timestamps are ISO-8601 text so rows read back identically on every driver.
export const jobs = pgTable('jobs', {
  id: serial('id').primaryKey(),
  customer: text('customer').notNull(),
  ticket: text('job_ticket').notNull(),
  inlayType: text('inlay_type').default('').notNull(),
  quantity: integer('quantity').notNull(),
  labelsPerRoll: integer('labels_per_roll').notNull(),
  printerName: text('printer_name').notNull(),
  createdAt: text('created_at').notNull(),
  completed: boolean('completed').default(false).notNull()
});

export const rollActions = pgTable('roll_tracking', {
  id: bigserial('id', { mode: 'number' }).primaryKey(),
  jobId: integer('job_id')
    .notNull()
    .references(() => jobs.id, { onDelete: 'cascade' }),
  rollNumber: integer('roll_number').notNull(),
  action: text('action').notNull(),
  note: text('note').default('').notNull(),
  timestamp: text('logged_at').notNull()
});

export const schema = {
  jobs,
  rollActions
};

export const CREATE_TABLES_SQL = `
  CREATE TABLE IF NOT EXISTS jobs (
    id SERIAL PRIMARY KEY,
    customer TEXT NOT NULL,
    job_ticket TEXT NOT NULL,
    inlay_type TEXT NOT NULL DEFAULT '',
    quantity INTEGER NOT NULL,
    labels_per_roll INTEGER NOT NULL,
    printer_name TEXT NOT NULL,
    created_at TEXT NOT NULL,
    completed BOOLEAN NOT NULL DEFAULT false
  );

  CREATE TABLE IF NOT EXISTS roll_tracking (
    id BIGSERIAL PRIMARY KEY,
    job_id INTEGER NOT NULL REFERENCES jobs(id) ON DELETE CASCADE,
    roll_number INTEGER NOT NULL,
    action TEXT NOT NULL,
    note TEXT NOT NULL DEFAULT '',
    logged_at TEXT NOT NULL
  );
`;
