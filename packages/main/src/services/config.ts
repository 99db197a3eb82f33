import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { dirname, join } from 'path';
import {
  CURRENT_SETTINGS_VERSION,
  DbSettingsSchema,
  IngestSettingsSchema,
  type IngestSettings,
  type Settings
} from '../../../shared/src';
import { logger } from '../logger';

const DEFAULT_SETTINGS: Settings = {
  version: CURRENT_SETTINGS_VERSION,
  db: {
    host: 'localhost',
    port: 5432,
    database: 'rolltrack',
    user: 'rolltrack_user',
    password: '',
    sslMode: 'disable',
    statementTimeoutMs: 30000
  },
  paths: { logDir: '' },
  ingest: IngestSettingsSchema.parse({}),
  printers: { exclusiveRuns: false }
};

let cache: Settings | null = null;

type MaybeSettings = Partial<Settings> | undefined | null | { [key: string]: unknown };

function asRecord(value: unknown): Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) ? (value as Record<string, unknown>) : {};
}

function cloneDefaults(): Settings {
  return {
    version: CURRENT_SETTINGS_VERSION,
    db: { ...DEFAULT_SETTINGS.db },
    paths: { ...DEFAULT_SETTINGS.paths },
    ingest: { ...DEFAULT_SETTINGS.ingest, extensions: [...DEFAULT_SETTINGS.ingest.extensions] },
    printers: { ...DEFAULT_SETTINGS.printers }
  };
}

function normalizeExtension(ext: string): string {
  const trimmed = ext.trim().toLowerCase();
  return trimmed.startsWith('.') ? trimmed : `.${trimmed}`;
}

function normalizeIngest(input: unknown): IngestSettings {
  const merged = { ...DEFAULT_SETTINGS.ingest, ...asRecord(input) };
  const parsed = IngestSettingsSchema.safeParse(merged);
  if (!parsed.success) {
    logger.warn({ issues: parsed.error.issues }, 'Invalid ingest settings; using defaults');
    return cloneDefaults().ingest;
  }
  return { ...parsed.data, extensions: parsed.data.extensions.map(normalizeExtension) };
}

function normalizeSettings(input: MaybeSettings): Settings {
  const base = asRecord(input);
  const db = { ...DEFAULT_SETTINGS.db, ...asRecord(base.db) } as Settings['db'];
  // Coerce password to a string to avoid pg errors when null/number are provided
  db.password = typeof db.password === 'string' ? db.password : db.password == null ? '' : String(db.password);
  const paths = { ...DEFAULT_SETTINGS.paths, ...asRecord(base.paths) } as Settings['paths'];
  const printers = { ...DEFAULT_SETTINGS.printers, ...asRecord(base.printers) } as Settings['printers'];
  return {
    version: typeof base.version === 'number' && base.version > 0 ? base.version : CURRENT_SETTINGS_VERSION,
    db,
    paths: { logDir: typeof paths.logDir === 'string' ? paths.logDir.trim() : '' },
    ingest: normalizeIngest(base.ingest),
    printers: { exclusiveRuns: printers.exclusiveRuns === true }
  };
}

// settings.json lives in the working directory unless ROLLTRACK_CONFIG_PATH points elsewhere
export function getConfigPath() {
  const override = process.env.ROLLTRACK_CONFIG_PATH?.trim();
  if (override) {
    return override;
  }
  return join(process.cwd(), 'settings.json');
}

function applyEnvOverrides(settings: Settings): Settings {
  const logDir = process.env.ROLLTRACK_LOG_SOURCE_DIR?.trim();
  const password = process.env.ROLLTRACK_DB_PASSWORD;
  return {
    ...settings,
    db: password ? { ...settings.db, password } : settings.db,
    paths: logDir ? { ...settings.paths, logDir } : settings.paths
  };
}

export function loadConfig(): Settings {
  if (cache) return cache;
  const file = getConfigPath();
  try {
    if (!existsSync(file)) {
      const defaults = cloneDefaults();
      writeConfig(defaults);
      logger.info({ file }, 'Config created with defaults');
      cache = applyEnvOverrides(defaults);
      return cache;
    }
    const raw = readFileSync(file, 'utf8');
    const normalized = normalizeSettings(JSON.parse(raw) as MaybeSettings);
    cache = applyEnvOverrides(normalized);
    logger.info({ file }, 'Config loaded');
    return cache;
  } catch (err) {
    logger.warn({ err, file }, 'Failed to load config');
    throw err instanceof Error ? err : new Error(String(err));
  }
}

function writeConfig(settings: Settings) {
  const file = getConfigPath();
  const dir = dirname(file);
  const normalized = normalizeSettings(settings);
  if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
  writeFileSync(file, JSON.stringify(normalized, null, 2), 'utf8');
  logger.info({ file }, 'Config saved');
}

export function redactSettings(settings: Settings): Settings {
  return {
    ...settings,
    db: { ...settings.db, password: settings.db.password ? '********' : '' }
  };
}

export function validateDbSettings(partial: Partial<Settings['db']>) {
  return DbSettingsSchema.partial().parse(partial);
}
