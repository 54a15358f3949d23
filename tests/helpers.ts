import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Logger, LogLevel } from '../src/common/logger';

export function makeTempDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `sysdiag-${prefix}-`));
}

/** Real logger that writes nothing below CRITICAL and never prints. */
export function quietLogger(dir: string): Logger {
  return new Logger('test', dir, { minLevel: LogLevel.CRITICAL, console: false });
}
