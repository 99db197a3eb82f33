import { tmpdir } from 'os';
import { join } from 'path';

process.env.LOG_LEVEL = process.env.LOG_LEVEL ?? 'silent';
process.env.ROLLTRACK_LOG_DIR = process.env.ROLLTRACK_LOG_DIR ?? join(tmpdir(), 'rolltrack-test-logs');
