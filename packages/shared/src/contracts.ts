import { z } from 'zod';

export const SslMode = z.enum(['disable', 'require', 'verify-ca', 'verify-full']);

export const DbSettingsSchema = z.object({
  host: z.string().min(1),
  port: z.number().int().min(1).max(65535).default(5432),
  database: z.string().min(1),
  user: z.string().min(1),
  password: z.string().min(1, 'Password is required'),
  sslMode: SslMode.default('disable'),
  statementTimeoutMs: z.number().int().min(0).max(600000).default(30000)
});
export type DbSettings = z.infer<typeof DbSettingsSchema>;

export const CURRENT_SETTINGS_VERSION = 1 as const;

export const DEFAULT_PRINTER_NAME = 'Printer_1';

export const IngestSettingsSchema = z.object({
  extensions: z.array(z.string().min(1)).min(1).default(['.csv']),
  defaultPrinter: z.string().min(1).default(DEFAULT_PRINTER_NAME),
  primeExistingFiles: z.boolean().default(true),
  debounceMs: z.number().int().min(0).max(60000).default(250),
  stabilityThresholdMs: z.number().int().min(0).max(60000).default(500),
  pollIntervalMs: z.number().int().min(10).max(10000).default(100)
});
export type IngestSettings = z.infer<typeof IngestSettingsSchema>;

export const SettingsSchema = z.object({
  version: z.number().int().min(1).default(CURRENT_SETTINGS_VERSION),
  db: DbSettingsSchema,
  paths: z.object({
    logDir: z.string().default('')
  }).default({ logDir: '' }),
  ingest: IngestSettingsSchema.default({}),
  printers: z.object({
    exclusiveRuns: z.boolean().default(false)
  }).default({ exclusiveRuns: false })
});
export type Settings = z.infer<typeof SettingsSchema>;

export const AppErrorSchema = z.object({
  code: z.string(),
  message: z.string(),
  details: z.any().optional()
});
export type AppError = z.infer<typeof AppErrorSchema>;

// Log ingestion

export const LogOutcome = z.enum(['pass', 'fail']);
export type LogOutcome = z.infer<typeof LogOutcome>;

export type LogEvent = Readonly<{
  printerId: string;
  outcome: LogOutcome;
}>;

export type FileCursor = {
  filePath: string;
  rowsConsumed: number;
};

export const PrinterCountersSchema = z.object({
  printerId: z.string().min(1),
  pass: z.number().int().nonnegative(),
  fail: z.number().int().nonnegative()
});
export type PrinterCounters = z.infer<typeof PrinterCountersSchema>;

export type CumulativeCounts = Pick<PrinterCounters, 'pass' | 'fail'>;

export type PrinterCountsSnapshot = Readonly<Record<string, Readonly<PrinterCounters>>>;

export type CountsUpdate = {
  counts: PrinterCountsSnapshot;
  file: string;
  newEvents: number;
  at: string;
};

// Jobs and rolls

export const JobInputSchema = z.object({
  customer: z.string().trim().min(1, 'Customer is required'),
  ticket: z.string().trim().min(1, 'Job ticket is required'),
  inlayType: z.string().trim().default(''),
  quantity: z.number().int().positive(),
  labelsPerRoll: z.number().int().positive(),
  printerName: z
    .string()
    .trim()
    .optional()
    .transform((value) => (value && value.length > 0 ? value : DEFAULT_PRINTER_NAME))
});
export type JobFields = z.output<typeof JobInputSchema>;

export type Job = JobFields & {
  id: number;
  createdAt: string;
  completed: boolean;
};

export const RollState = z.enum(['idle', 'running', 'paused', 'stopped', 'completed']);
export type RollState = z.infer<typeof RollState>;

export const ROLL_ACTIONS = ['start', 'resume', 'stop', 'completed', 'pause note', 'job completed'] as const;
export type RollActionName = (typeof ROLL_ACTIONS)[number];

export type RollNote = {
  timestamp: string;
  progressAtTime: number;
  text: string;
};

export type RollSnapshot = {
  jobId: number;
  rollNumber: number;
  labelsGoal: number;
  state: RollState;
  baselinePass: number | null;
  baselineFail: number | null;
  currentProgress: number;
  deltaPass: number;
  deltaFail: number;
  noteEntryOpen: boolean;
  noteDraft: string;
  notes: RollNote[];
};

export type RollAction = {
  id: number;
  jobId: number;
  rollNumber: number;
  action: string;
  note: string;
  timestamp: string;
};

export type JobSnapshot = {
  job: Job;
  totalRolls: number;
  completed: boolean;
  runningRoll: number | null;
  rolls: RollSnapshot[];
};

export type Confirmation = { confirmed: boolean };
