import * as fs from 'fs';
import { createCollectors, Collector } from '../src/collectors';
import { StartupCollector } from '../src/collectors/startup-collector';
import { ScanStateError } from '../src/common/errors';
import { Logger } from '../src/common/logger';
import { DiagnosticSources } from '../src/monitoring/sources';
import { ScanOrchestrator, selectCategories } from '../src/scan/scan-orchestrator';
import { BUSY_PROCESS_SNAPSHOTS, DISCORD_ENTRY, fakeSources, hang, snapshotSequence } from './fixtures';
import { makeTempDir, quietLogger } from './helpers';

let tmpDir: string;
let logger: Logger;

beforeEach(() => {
  tmpDir = makeTempDir('scan');
  logger = quietLogger(tmpDir);
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

function fixedClock(): () => Date {
  let seconds = 0;
  return () => new Date(Date.UTC(2026, 0, 1, 0, 0, seconds++));
}

function orchestratorFor(sources: DiagnosticSources): ScanOrchestrator {
  const collectors = createCollectors(sources, logger, { sampleWindowMs: 0 });
  return new ScanOrchestrator(collectors, logger, { hostname: 'test-host', now: fixedClock() });
}

const busySources = (overrides: Partial<DiagnosticSources> = {}) => fakeSources({
  startup: { listStartupEntries: async () => [DISCORD_ENTRY] },
  processes: { sampleProcesses: snapshotSequence(BUSY_PROCESS_SNAPSHOTS) },
  ...overrides,
});

describe('selectCategories', () => {
  it('runs startup and processes for a quick scan by default', () => {
    expect(selectCategories('quick')).toEqual(['Startup', 'Process']);
  });

  it('honours a configured quick set and ignores it for full scans', () => {
    expect(selectCategories('quick', ['Disk', 'Startup'])).toEqual(['Startup', 'Disk']);
    expect(selectCategories('full', ['Disk'])).toHaveLength(6);
  });
});

describe('ScanOrchestrator', () => {
  it('quick scan with a high-impact startup item and a busy process', async () => {
    const orchestrator = orchestratorFor(busySources());

    const scan = await orchestrator.run({ mode: 'quick', elevated: false });

    expect(Object.keys(scan.per_category).sort()).toEqual(['Process', 'Startup']);
    expect(scan.summary.counts_by_severity).toEqual({ OK: 0, Warning: 1, Critical: 1 });
    expect(scan.summary.recommendations).toEqual([
      {
        severity: 'Critical',
        category: 'Process',
        identifier: 'render (PID 42)',
        action_text: 'Investigate render (PID 42); close or restart it if the load is unexpected',
      },
      {
        severity: 'Warning',
        category: 'Startup',
        identifier: 'Discord',
        action_text: 'Disable Discord at startup unless it is needed right after sign-in',
      },
    ]);
    expect(orchestrator.getState()).toBe('completed');
  });

  it('stamps the result with mode, host and timing', async () => {
    const scan = await orchestratorFor(busySources()).run({ mode: 'quick', elevated: true });

    expect(scan.mode).toBe('quick');
    expect(scan.hostname).toBe('test-host');
    expect(scan.elevated).toBe(true);
    expect(scan.timestamp).toBe('2026-01-01T00:00:00.000Z');
    expect(scan.completed_at).toBe('2026-01-01T00:00:01.000Z');
    expect(scan.duration_ms).toBe(1000);
  });

  it('isolates a timed-out collector during a full scan', async () => {
    const orchestrator = orchestratorFor(busySources({ drivers: { listDevices: () => hang() } }));

    const scan = await orchestrator.run({ mode: 'full', elevated: false, timeoutsMs: { Driver: 50 } });

    expect(scan.per_category.Driver?.failure).toEqual({ kind: 'timeout', message: 'Driver collection timed out after 50ms' });
    expect(scan.summary.not_evaluated).toEqual(['Driver']);
    expect(scan.summary.counts_by_category.Driver).toBeUndefined();
    for (const category of ['Startup', 'Service', 'Process', 'Disk', 'ScheduledTask'] as const) {
      expect(scan.per_category[category]?.failure).toBeUndefined();
    }
    expect(scan.summary.counts_by_severity).toEqual({ OK: 0, Warning: 1, Critical: 1 });
    expect(orchestrator.getState()).toBe('completed');
  });

  it('cancels every outstanding collector and still completes', async () => {
    const orchestrator = orchestratorFor({
      startup: { listStartupEntries: () => hang() },
      services: { listAutoStartServices: () => hang() },
      processes: { sampleProcesses: () => hang() },
      disks: { readDiskState: () => hang() },
      drivers: { listDevices: () => hang() },
      tasks: { listTasks: () => hang() },
    });

    const pending = orchestrator.run({ mode: 'full', elevated: false });
    expect(orchestrator.getState()).toBe('running');
    orchestrator.cancel();
    const scan = await pending;

    for (const result of Object.values(scan.per_category)) {
      expect(result?.failure).toEqual({ kind: 'cancelled', message: 'Scan cancelled' });
    }
    expect(scan.summary.not_evaluated).toEqual(['Disk', 'Driver', 'Process', 'Service', 'ScheduledTask', 'Startup']);
    expect(orchestrator.getState()).toBe('completed');
  });

  it('contains a collector that throws instead of reporting', async () => {
    const broken: Collector = {
      category: 'Service',
      collect: async () => { throw new Error('boom'); },
    };
    const orchestrator = new ScanOrchestrator([broken], logger);

    const scan = await orchestrator.run({ mode: 'quick', elevated: false, quickCategories: ['Service'] });

    expect(scan.per_category.Service?.failure).toEqual({ kind: 'unavailable', message: 'boom' });
    expect(scan.summary.not_evaluated).toEqual(['Service']);
  });

  it('runs only once', async () => {
    const orchestrator = orchestratorFor(busySources());
    await orchestrator.run({ mode: 'quick', elevated: false });

    await expect(orchestrator.run({ mode: 'quick', elevated: false })).rejects.toBeInstanceOf(ScanStateError);
  });

  it('fails when a selected category has no collector', async () => {
    const orchestrator = new ScanOrchestrator([new StartupCollector(fakeSources().startup, logger)], logger);

    await expect(orchestrator.run({ mode: 'full', elevated: false }))
      .rejects.toThrow('No collector registered for: Service, Process, Disk, Driver, ScheduledTask');
    expect(orchestrator.getState()).toBe('failed');
  });
});
