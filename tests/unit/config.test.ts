import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';

const ENV_KEY = 'ROLLTRACK_CONFIG_PATH';

describe('config service', () => {
  let tempDir: string;
  let file: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'rolltrack-config-'));
    file = join(tempDir, 'settings.json');
    process.env[ENV_KEY] = file;
    vi.resetModules();
  });

  afterEach(() => {
    delete process.env[ENV_KEY];
    delete process.env.ROLLTRACK_LOG_SOURCE_DIR;
    rmSync(tempDir, { recursive: true, force: true });
  });

  async function loadModule() {
    return import('../../packages/main/src/services/config');
  }

  it('creates defaults when the settings file is missing', async () => {
    const { loadConfig } = await loadModule();
    const cfg = loadConfig();

    expect(cfg.db.host).toBe('localhost');
    expect(cfg.ingest).toMatchObject({ extensions: ['.csv'], defaultPrinter: 'Printer_1', primeExistingFiles: true });
    expect(cfg.printers.exclusiveRuns).toBe(false);
    expect(existsSync(file)).toBe(true);
    const written = JSON.parse(readFileSync(file, 'utf8'));
    expect(written.db.database).toBe('rolltrack');
  });

  it('reads an existing settings file over the defaults', async () => {
    writeFileSync(file, JSON.stringify({ db: { host: 'db.internal', password: 42 }, paths: { logDir: ' /var/printer-logs ' } }));
    const { loadConfig } = await loadModule();
    const cfg = loadConfig();

    expect(cfg.db).toMatchObject({ host: 'db.internal', port: 5432, password: '42' });
    expect(cfg.paths.logDir).toBe('/var/printer-logs');
  });

  it('normalises ingest settings and falls back on invalid values', async () => {
    writeFileSync(
      file,
      JSON.stringify({ ingest: { extensions: ['CSV', '.Txt'], debounceMs: 100 }, printers: { exclusiveRuns: 'yes' } })
    );
    const { loadConfig } = await loadModule();
    const cfg = loadConfig();
    expect(cfg.ingest.extensions).toEqual(['.csv', '.txt']);
    expect(cfg.ingest.debounceMs).toBe(100);
    expect(cfg.printers.exclusiveRuns).toBe(false);

    writeFileSync(file, JSON.stringify({ ingest: { debounceMs: -5 } }));
    vi.resetModules();
    expect((await loadModule()).loadConfig().ingest.debounceMs).toBe(250);
  });

  it('lets the environment choose the log directory', async () => {
    process.env.ROLLTRACK_LOG_SOURCE_DIR = '/mnt/printer';
    const { loadConfig } = await loadModule();
    expect(loadConfig().paths.logDir).toBe('/mnt/printer');
  });

  it('redacts the database password', async () => {
    const { loadConfig, redactSettings } = await loadModule();
    const cfg = loadConfig();
    cfg.db.password = 'test-secret';
    expect(redactSettings(cfg).db.password).toBe('********');
  });
});
