// startup-collector.ts - Auto-run registry keys and startup folders
import { Logger } from '../common/logger';
import { buildFinding } from '../detection/classifier';
import { StartupSource } from '../monitoring/sources';
import { FindingOf } from '../types';
import { BaseCollector, CollectContext } from './base-collector';

const EXECUTABLE_PATTERN = /^(.+?\.(?:exe|com|bat|cmd|lnk|scr))(?:\s|$)/i;

/**
 * Executable part of a command line:
 * `"C:\Program Files\App\app.exe" --min` -> `C:\Program Files\App\app.exe`.
 */
export function resolveExecutablePath(command: string): string {
  const trimmed = command.trim();

  if (trimmed.startsWith('"')) {
    const end = trimmed.indexOf('"', 1);
    return end > 0 ? trimmed.substring(1, end) : trimmed.substring(1);
  }

  const match = EXECUTABLE_PATTERN.exec(trimmed);
  if (match) return match[1];

  return trimmed.split(/\s+/)[0] ?? '';
}

export class StartupCollector extends BaseCollector<'Startup'> {
  readonly category = 'Startup' as const;
  private source: StartupSource;

  constructor(source: StartupSource, logger: Logger) {
    super(logger);
    this.source = source;
  }

  protected async gather(context: CollectContext): Promise<FindingOf<'Startup'>[]> {
    const entries = await this.source.listStartupEntries(context);

    const seen = new Set<string>();
    const findings: FindingOf<'Startup'>[] = [];

    for (const entry of entries) {
      const resolved = resolveExecutablePath(entry.target_path ?? entry.command);
      const key = resolved.toLowerCase();
      if (key !== '' && seen.has(key)) {
        this.logger.debug('Duplicate startup entry skipped', { name: entry.name, source: entry.source });
        continue;
      }
      seen.add(key);

      findings.push(buildFinding('Startup', entry.name, {
        name: entry.name,
        command: entry.command,
        source: entry.source,
        resolved_path: resolved,
      }));
    }

    return findings;
  }
}
