// windows-instrumentation.ts - Read-only registry/CIM/filesystem queries for every category
import * as fs from 'fs';
import * as path from 'path';
import fg from 'fast-glob';
import { Logger } from '../common/logger';
import { CollectorUnavailableError } from '../common/errors';
import { PowerShellRunner, psQuote, runPowerShell } from './powershell';
import {
  asRecords,
  driveOf,
  isRecord,
  parseIsoDuration,
  toBool,
  toNumber,
  toOptionalStr,
  toStr,
  tryParseJson,
} from './parse';
import {
  DiagnosticSources,
  DiskSource,
  DriverSource,
  ProcessSnapshot,
  ProcessSource,
  QueryOptions,
  RawDevice,
  RawDiskState,
  RawDriveMapping,
  RawFailurePrediction,
  RawService,
  RawStartupEntry,
  RawTask,
  RawTempLocation,
  RawTrigger,
  RawVolume,
  ServiceSource,
  StartupSource,
  TaskSource,
  TriggerKind,
} from './sources';
import { Category } from '../types';

const STARTUP_EXTENSIONS = ['lnk', 'exe', 'bat', 'cmd'];

const RUN_KEYS: Array<{ path: string; source: string }> = [
  { path: 'HKCU:\\Software\\Microsoft\\Windows\\CurrentVersion\\Run', source: 'HKCU\\Run' },
  { path: 'HKLM:\\Software\\Microsoft\\Windows\\CurrentVersion\\Run', source: 'HKLM\\Run' },
  { path: 'HKLM:\\Software\\WOW6432Node\\Microsoft\\Windows\\CurrentVersion\\Run', source: 'HKLM\\Run (x86)' },
];

export interface WindowsInstrumentationOptions {
  runner?: PowerShellRunner;
  env?: NodeJS.ProcessEnv;
  queryTimeoutMs?: number;
}

export class WindowsInstrumentation implements StartupSource, ServiceSource, ProcessSource, DiskSource, DriverSource, TaskSource {
  private logger: Logger;
  private runner: PowerShellRunner;
  private env: NodeJS.ProcessEnv;
  private queryTimeoutMs: number;

  constructor(logger: Logger, options: WindowsInstrumentationOptions = {}) {
    this.logger = logger;
    this.runner = options.runner ?? runPowerShell;
    this.env = options.env ?? process.env;
    this.queryTimeoutMs = options.queryTimeoutMs ?? 60000;
  }

  // Every script prints at least `[]` or `{}`, so unreadable output means the query broke
  private async query(category: Category, label: string, script: string, options: QueryOptions): Promise<unknown> {
    const stdout = await this.runner(script, { timeout: this.queryTimeoutMs, signal: options.signal });
    const data = tryParseJson(stdout);
    if (data === undefined) {
      this.logger.warn(`${label} returned unreadable output`, { output: stdout.slice(0, 200) });
      throw new CollectorUnavailableError(category, `${label} returned unreadable output`);
    }
    return data;
  }

  // ============================
  // STARTUP
  // ============================

  async listStartupEntries(options: QueryOptions): Promise<RawStartupEntry[]> {
    const entries: RawStartupEntry[] = [];
    let anySourceRead = false;

    try {
      entries.push(...await this.readRunKeys(options));
      anySourceRead = true;
    } catch (err) {
      if (options.signal?.aborted) throw err;
      this.logger.warn('Run key query failed', undefined, err);
    }

    const folders = [
      { dir: this.startupFolder(this.env.APPDATA), source: 'User Startup Folder' },
      { dir: this.startupFolder(this.env.PROGRAMDATA), source: 'Common Startup Folder' },
    ];

    for (const folder of folders) {
      if (!folder.dir) continue;
      try {
        entries.push(...await this.readStartupFolder(folder.dir, folder.source, options));
        anySourceRead = true;
      } catch (err) {
        if (options.signal?.aborted) throw err;
        this.logger.warn('Startup folder unreadable', { folder: folder.dir }, err);
      }
    }

    if (!anySourceRead) {
      throw new CollectorUnavailableError('Startup', 'No startup location could be read');
    }
    return entries;
  }

  private startupFolder(base: string | undefined): string | null {
    if (!base) return null;
    return path.join(base, 'Microsoft', 'Windows', 'Start Menu', 'Programs', 'Startup');
  }

  private async readRunKeys(options: QueryOptions): Promise<RawStartupEntry[]> {
    const locations = RUN_KEYS
      .map(k => `@{ Path = ${psQuote(k.path)}; Source = ${psQuote(k.source)} }`)
      .join(',\n        ');

    const script = `
      $locations = @(
        ${locations}
      )
      $results = @()
      foreach ($loc in $locations) {
        $key = Get-Item -LiteralPath $loc.Path -ErrorAction SilentlyContinue
        if (-not $key) { continue }
        foreach ($name in $key.GetValueNames()) {
          if ($name -eq '') { continue }
          $results += @{ name = $name; command = [string]$key.GetValue($name); source = $loc.Source }
        }
      }
      ConvertTo-Json -InputObject @($results) -Depth 3 -Compress
    `;

    const data = await this.query('Startup', 'Run key query', script, options);
    return asRecords(data).map(r => ({
      name: toStr(r.name),
      command: toStr(r.command),
      source: toStr(r.source),
      target_path: null,
    }));
  }

  private async readStartupFolder(dir: string, source: string, options: QueryOptions): Promise<RawStartupEntry[]> {
    if (!fs.existsSync(dir)) return [];

    const files = await fg(`*.{${STARTUP_EXTENSIONS.join(',')}}`, {
      cwd: dir,
      absolute: true,
      onlyFiles: true,
      caseSensitiveMatch: false,
    });
    files.sort();

    const shortcuts = files.filter(f => f.toLowerCase().endsWith('.lnk'));
    const targets = shortcuts.length > 0 ? await this.resolveShortcuts(shortcuts, options) : new Map<string, string>();

    return files.map(file => {
      const nativePath = path.normalize(file);
      return {
        name: path.parse(file).name,
        command: nativePath,
        source,
        target_path: targets.get(file) ?? null,
      };
    });
  }

  private async resolveShortcuts(files: string[], options: QueryOptions): Promise<Map<string, string>> {
    const script = `
      $shell = New-Object -ComObject WScript.Shell
      $paths = @(${files.map(f => psQuote(path.normalize(f))).join(', ')})
      $out = @()
      for ($i = 0; $i -lt $paths.Count; $i++) {
        try { $target = $shell.CreateShortcut($paths[$i]).TargetPath } catch { $target = $null }
        $out += @{ index = $i; target = $target }
      }
      ConvertTo-Json -InputObject @($out) -Compress
    `;

    const targets = new Map<string, string>();
    try {
      const data = await this.query('Startup', 'Shortcut query', script, options);
      for (const r of asRecords(data)) {
        const index = toNumber(r.index);
        const target = toOptionalStr(r.target);
        if (index !== null && target && files[index] !== undefined) {
          targets.set(files[index], target);
        }
      }
    } catch (err) {
      if (options.signal?.aborted) throw err;
      this.logger.warn('Shortcut targets could not be resolved', { count: files.length }, err);
    }
    return targets;
  }

  // ============================
  // SERVICES
  // ============================

  async listAutoStartServices(options: QueryOptions): Promise<RawService[]> {
    const script = `
      $services = @(Get-CimInstance Win32_Service -Filter "StartMode='Auto'" -ErrorAction Stop | ForEach-Object {
        $exe = $null
        $publisher = $null
        if ($_.PathName) {
          if ($_.PathName -match '^\\s*"([^"]+)"') { $exe = $Matches[1] }
          elseif ($_.PathName -match '^\\s*(.+?\\.exe)') { $exe = $Matches[1] }
          else { $exe = ($_.PathName -split '\\s+')[0] }
          try { $publisher = (Get-Item -LiteralPath $exe -ErrorAction Stop).VersionInfo.CompanyName } catch {}
        }
        @{
          name = $_.Name
          display_name = $_.DisplayName
          state = $_.State
          start_mode = $_.StartMode
          binary_path = $exe
          publisher = $publisher
        }
      })
      ConvertTo-Json -InputObject $services -Depth 3 -Compress
    `;

    const data = await this.query('Service', 'Service query', script, options);
    return parseServices(data);
  }

  // ============================
  // PROCESSES
  // ============================

  async sampleProcesses(options: QueryOptions): Promise<ProcessSnapshot> {
    const script = `
      $cim = @{}
      Get-CimInstance Win32_Process -ErrorAction SilentlyContinue | ForEach-Object { $cim[[int]$_.ProcessId] = $_ }
      $takenAt = [DateTimeOffset]::UtcNow.ToUnixTimeMilliseconds()
      $list = @(Get-Process | Where-Object { $_.Id -ne 0 } | ForEach-Object {
        $c = $cim[$_.Id]
        $cpu = $null
        try { if ($_.TotalProcessorTime) { $cpu = $_.TotalProcessorTime.TotalSeconds } } catch {}
        @{
          pid = $_.Id
          name = $_.ProcessName
          cpu_seconds = $cpu
          working_set_bytes = $_.WorkingSet64
          read_bytes = if ($c) { $c.ReadTransferCount } else { $null }
          write_bytes = if ($c) { $c.WriteTransferCount } else { $null }
        }
      })
      ConvertTo-Json -InputObject @{ taken_at_ms = $takenAt; processes = $list } -Depth 4 -Compress
    `;

    const data = await this.query('Process', 'Process query', script, options);
    return parseProcessSnapshot(data);
  }

  // ============================
  // DISKS
  // ============================

  async readDiskState(options: QueryOptions): Promise<RawDiskState> {
    const script = `
      $volumes = @(Get-CimInstance Win32_LogicalDisk -Filter "DriveType=3" -ErrorAction Stop | ForEach-Object {
        @{ drive = $_.DeviceID; size_bytes = $_.Size; free_bytes = $_.FreeSpace }
      })
      $map = $null
      try {
        $map = @(Get-CimInstance Win32_DiskDrive -ErrorAction Stop | ForEach-Object {
          $pnp = $_.PNPDeviceID
          Get-CimAssociatedInstance -InputObject $_ -ResultClassName Win32_DiskPartition | ForEach-Object {
            Get-CimAssociatedInstance -InputObject $_ -ResultClassName Win32_LogicalDisk
          } | ForEach-Object { @{ drive = $_.DeviceID; pnp_device_id = $pnp } }
        })
      } catch {}
      ConvertTo-Json -InputObject @{ volumes = $volumes; drive_map = $map } -Depth 4 -Compress
    `;

    const data = await this.query('Disk', 'Volume query', script, options);
    const layout = parseDiskLayout(data);

    const [failurePredictions, tempLocations] = await Promise.all([
      this.readFailurePredictions(options),
      this.measureTempLocations(),
    ]);

    return {
      volumes: layout.volumes,
      drive_map: layout.drive_map,
      failure_predictions: failurePredictions,
      temp_locations: tempLocations,
    };
  }

  private async readFailurePredictions(options: QueryOptions): Promise<RawFailurePrediction[] | null> {
    // root\\wmi failure prediction is only readable from an elevated session
    if (!options.elevated) {
      return null;
    }

    const script = `
      $status = @(Get-CimInstance -Namespace root\\wmi -ClassName MSStorageDriver_FailurePredictStatus -ErrorAction Stop | ForEach-Object {
        @{ instance_name = $_.InstanceName; predict_failure = [bool]$_.PredictFailure }
      })
      ConvertTo-Json -InputObject $status -Compress
    `;

    try {
      const data = await this.query('Disk', 'Failure prediction query', script, options);
      return asRecords(data).map(r => ({
        instance_name: toStr(r.instance_name),
        predict_failure: toBool(r.predict_failure) ?? false,
      }));
    } catch (err) {
      if (options.signal?.aborted) throw err;
      this.logger.warn('Failure prediction status unavailable', undefined, err);
      return null;
    }
  }

  tempLocationPaths(): string[] {
    const systemRoot = this.env.SystemRoot ?? this.env.SYSTEMROOT ?? 'C:\\Windows';
    const candidates = [this.env.TEMP, this.env.TMP, path.win32.join(systemRoot, 'Temp')];

    const seen = new Set<string>();
    const result: string[] = [];
    for (const candidate of candidates) {
      if (!candidate) continue;
      const key = candidate.toLowerCase().replace(/[\\/]+$/, '');
      if (seen.has(key)) continue;
      seen.add(key);
      result.push(candidate);
    }
    return result;
  }

  async measureTempLocations(): Promise<RawTempLocation[]> {
    const locations: RawTempLocation[] = [];

    for (const dir of this.tempLocationPaths()) {
      if (!fs.existsSync(dir)) continue;

      let bytes: number | null = null;
      try {
        const stats = await fs.promises.stat(dir);
        if (!stats.isDirectory()) {
          throw new Error(`${dir} is not a directory`);
        }
        await fs.promises.access(dir, fs.constants.R_OK);

        // fast-glob only suppresses ENOENT here; a denied subdirectory rejects
        const entries = await fg('**/*', {
          cwd: dir,
          onlyFiles: true,
          dot: true,
          stats: true,
          followSymbolicLinks: false,
        });
        bytes = entries.reduce((sum, entry) => sum + (entry.stats?.size ?? 0), 0);
      } catch (err) {
        this.logger.warn('Temp location could not be measured', { path: dir }, err);
      }

      locations.push({ path: dir, drive: driveOf(dir), bytes });
    }

    return locations;
  }

  // ============================
  // DRIVERS
  // ============================

  async listDevices(options: QueryOptions): Promise<RawDevice[]> {
    const script = `
      $devices = @(Get-CimInstance Win32_PnPEntity -ErrorAction Stop | ForEach-Object {
        @{ name = $_.Name; device_id = $_.DeviceID; status = $_.Status; error_code = $_.ConfigManagerErrorCode }
      })
      $signed = $null
      try {
        $signed = @(Get-CimInstance Win32_PnPSignedDriver -ErrorAction Stop | Where-Object { $_.DeviceID } | ForEach-Object {
          @{ device_id = $_.DeviceID; is_signed = $_.IsSigned; driver_version = $_.DriverVersion; provider = $_.DriverProviderName }
        })
      } catch {}
      ConvertTo-Json -InputObject @{ devices = $devices; signed_drivers = $signed } -Depth 4 -Compress
    `;

    const data = await this.query('Driver', 'Device query', script, options);
    return parseDevices(data);
  }

  // ============================
  // SCHEDULED TASKS
  // ============================

  async listTasks(options: QueryOptions): Promise<RawTask[]> {
    const script = `
      $tasks = @(Get-ScheduledTask -ErrorAction Stop | ForEach-Object {
        @{
          name = $_.TaskName
          task_path = $_.TaskPath
          state = [string]$_.State
          author = $_.Author
          triggers = @($_.Triggers | Where-Object { $_ } | ForEach-Object {
            @{
              class = $_.CimClass.CimClassName
              enabled = [bool]$_.Enabled
              interval = if ($_.Repetition) { $_.Repetition.Interval } else { $null }
            }
          })
        }
      })
      ConvertTo-Json -InputObject $tasks -Depth 5 -Compress
    `;

    const data = await this.query('ScheduledTask', 'Scheduled task query', script, options);
    return parseTasks(data);
  }
}

// ============================
// PARSERS (exported for tests)
// ============================

export function parseServices(data: unknown): RawService[] {
  return asRecords(data).map(r => ({
    name: toStr(r.name),
    display_name: toStr(r.display_name),
    state: toStr(r.state, 'Unknown'),
    start_mode: toStr(r.start_mode),
    binary_path: toOptionalStr(r.binary_path),
    publisher: toOptionalStr(r.publisher),
  }));
}

export function parseProcessSnapshot(data: unknown): ProcessSnapshot {
  if (!isRecord(data)) {
    throw new CollectorUnavailableError('Process', 'Process table query returned no data');
  }

  const takenAt = toNumber(data.taken_at_ms);
  if (takenAt === null) {
    throw new CollectorUnavailableError('Process', 'Process snapshot is missing its timestamp');
  }

  const processes = asRecords(data.processes)
    .map(r => ({
      pid: toNumber(r.pid) ?? -1,
      name: toStr(r.name, 'Unknown'),
      cpu_seconds: toNumber(r.cpu_seconds),
      working_set_bytes: toNumber(r.working_set_bytes),
      read_bytes: toNumber(r.read_bytes),
      write_bytes: toNumber(r.write_bytes),
    }))
    .filter(p => p.pid > 0);

  return { taken_at_ms: takenAt, processes };
}

export function parseDiskLayout(data: unknown): { volumes: RawVolume[]; drive_map: RawDriveMapping[] | null } {
  if (!isRecord(data)) {
    throw new CollectorUnavailableError('Disk', 'Volume query returned no data');
  }

  const volumes: RawVolume[] = [];
  for (const r of asRecords(data.volumes)) {
    const size = toNumber(r.size_bytes);
    const free = toNumber(r.free_bytes);
    // Unready volumes report no size
    if (size === null || free === null || size <= 0) continue;
    volumes.push({ drive: toStr(r.drive).toUpperCase(), size_bytes: size, free_bytes: free });
  }

  const driveMap = data.drive_map === null || data.drive_map === undefined
    ? null
    : asRecords(data.drive_map).map(r => ({
      drive: toStr(r.drive).toUpperCase(),
      pnp_device_id: toStr(r.pnp_device_id),
    }));

  return { volumes, drive_map: driveMap };
}

export function parseDevices(data: unknown): RawDevice[] {
  if (!isRecord(data)) {
    throw new CollectorUnavailableError('Driver', 'Device query returned no data');
  }

  const signatureQueryFailed = data.signed_drivers === null || data.signed_drivers === undefined;
  const signed = new Map<string, { is_signed: boolean | null; driver_version: string | null; provider: string | null }>();
  for (const r of asRecords(data.signed_drivers)) {
    signed.set(toStr(r.device_id).toUpperCase(), {
      is_signed: toBool(r.is_signed),
      driver_version: toOptionalStr(r.driver_version),
      provider: toOptionalStr(r.provider),
    });
  }

  return asRecords(data.devices).map(r => {
    const deviceId = toStr(r.device_id);
    const driver = signed.get(deviceId.toUpperCase());
    return {
      name: toStr(r.name) || 'Unknown Device',
      device_id: deviceId,
      status: toStr(r.status),
      error_code: toNumber(r.error_code),
      // Devices without a driver entry have nothing to sign; only a failed query is Unknown
      is_signed: driver ? driver.is_signed : (signatureQueryFailed ? null : true),
      driver_version: driver?.driver_version ?? null,
      provider: driver?.provider ?? null,
    };
  });
}

const TRIGGER_KINDS: Record<string, TriggerKind> = {
  msft_tasklogontrigger: 'logon',
  msft_taskboottrigger: 'boot',
  msft_tasktimetrigger: 'schedule',
  msft_taskdailytrigger: 'schedule',
  msft_taskweeklytrigger: 'schedule',
};

export function parseTrigger(r: Record<string, unknown>): RawTrigger {
  return {
    kind: TRIGGER_KINDS[toStr(r.class).toLowerCase()] ?? 'other',
    enabled: toBool(r.enabled) ?? true,
    interval_seconds: parseIsoDuration(toOptionalStr(r.interval)),
  };
}

export function parseTasks(data: unknown): RawTask[] {
  return asRecords(data).map(r => ({
    name: toStr(r.name),
    task_path: toStr(r.task_path, '\\'),
    state: toStr(r.state, 'Unknown'),
    author: toOptionalStr(r.author),
    triggers: asRecords(r.triggers).map(parseTrigger),
  }));
}

export function createWindowsSources(logger: Logger, options: WindowsInstrumentationOptions = {}): DiagnosticSources {
  const instrumentation = new WindowsInstrumentation(logger, options);
  return {
    startup: instrumentation,
    services: instrumentation,
    processes: instrumentation,
    disks: instrumentation,
    drivers: instrumentation,
    tasks: instrumentation,
  };
}
