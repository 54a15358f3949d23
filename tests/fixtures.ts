import { DiagnosticSources, ProcessSnapshot, RawDiskState, RawStartupEntry } from '../src/monitoring/sources';

export const EMPTY_DISK_STATE: RawDiskState = {
  volumes: [],
  drive_map: [],
  failure_predictions: [],
  temp_locations: [],
};

/** A promise that never settles, standing in for a hung instrumentation query. */
export function hang<T>(): Promise<T> {
  return new Promise<T>(() => undefined);
}

export function snapshotSequence(snapshots: ProcessSnapshot[]): () => Promise<ProcessSnapshot> {
  let calls = 0;
  return async () => {
    const snapshot = snapshots[Math.min(calls, snapshots.length - 1)];
    calls++;
    return snapshot;
  };
}

export const DISCORD_ENTRY: RawStartupEntry = {
  name: 'Discord',
  command: '"C:\\Users\\test\\AppData\\Local\\Discord\\Update.exe" --processStart Discord.exe',
  source: 'HKCU\\Run',
  target_path: null,
};

/** One process going from 10.0 to 11.2 CPU-seconds over a 2 s window: 60% CPU. */
export const BUSY_PROCESS_SNAPSHOTS: ProcessSnapshot[] = [
  {
    taken_at_ms: 1000,
    processes: [{ pid: 42, name: 'render', cpu_seconds: 10, working_set_bytes: 100e6, read_bytes: 0, write_bytes: 0 }],
  },
  {
    taken_at_ms: 3000,
    processes: [{ pid: 42, name: 'render', cpu_seconds: 11.2, working_set_bytes: 100e6, read_bytes: 10, write_bytes: 20 }],
  },
];

export function fakeSources(overrides: Partial<DiagnosticSources> = {}): DiagnosticSources {
  return {
    startup: { listStartupEntries: async () => [] },
    services: { listAutoStartServices: async () => [] },
    processes: { sampleProcesses: snapshotSequence([{ taken_at_ms: 0, processes: [] }]) },
    disks: { readDiskState: async () => EMPTY_DISK_STATE },
    drivers: { listDevices: async () => [] },
    tasks: { listTasks: async () => [] },
    ...overrides,
  };
}
