// sources.ts - Raw OS facts and the per-category provider contracts
//
// Collectors only see these interfaces, so the Windows implementation can be
// swapped for another platform (or a test fake) without touching the rules.

export interface QueryOptions {
  signal?: AbortSignal;
  elevated: boolean;
}

export interface RawStartupEntry {
  name: string;
  command: string;
  source: string;
  // Shortcut target for startup-folder .lnk files
  target_path: string | null;
}

export interface RawService {
  name: string;
  display_name: string;
  state: string;
  start_mode: string;
  binary_path: string | null;
  publisher: string | null;
}

export interface RawProcess {
  pid: number;
  name: string;
  cpu_seconds: number | null;
  working_set_bytes: number | null;
  read_bytes: number | null;
  write_bytes: number | null;
}

export interface ProcessSnapshot {
  taken_at_ms: number;
  processes: RawProcess[];
}

export interface RawVolume {
  drive: string;
  size_bytes: number;
  free_bytes: number;
}

export interface RawDriveMapping {
  drive: string;
  pnp_device_id: string;
}

export interface RawFailurePrediction {
  instance_name: string;
  predict_failure: boolean;
}

export interface RawTempLocation {
  path: string;
  drive: string | null;
  bytes: number | null;
}

export interface RawDiskState {
  volumes: RawVolume[];
  // null when the query could not run (privilege, service down)
  drive_map: RawDriveMapping[] | null;
  failure_predictions: RawFailurePrediction[] | null;
  temp_locations: RawTempLocation[];
}

export interface RawDevice {
  name: string;
  device_id: string;
  status: string;
  error_code: number | null;
  is_signed: boolean | null;
  driver_version: string | null;
  provider: string | null;
}

export type TriggerKind = 'logon' | 'boot' | 'schedule' | 'other';

export interface RawTrigger {
  kind: TriggerKind;
  enabled: boolean;
  interval_seconds: number | null;
}

export interface RawTask {
  name: string;
  task_path: string;
  state: string;
  author: string | null;
  triggers: RawTrigger[];
}

export interface StartupSource {
  listStartupEntries(options: QueryOptions): Promise<RawStartupEntry[]>;
}

export interface ServiceSource {
  listAutoStartServices(options: QueryOptions): Promise<RawService[]>;
}

export interface ProcessSource {
  sampleProcesses(options: QueryOptions): Promise<ProcessSnapshot>;
}

export interface DiskSource {
  readDiskState(options: QueryOptions): Promise<RawDiskState>;
}

export interface DriverSource {
  listDevices(options: QueryOptions): Promise<RawDevice[]>;
}

export interface TaskSource {
  listTasks(options: QueryOptions): Promise<RawTask[]>;
}

export interface DiagnosticSources {
  startup: StartupSource;
  services: ServiceSource;
  processes: ProcessSource;
  disks: DiskSource;
  drivers: DriverSource;
  tasks: TaskSource;
}
