import * as fs from 'fs';
import * as path from 'path';
import { PowerShellRunner } from '../src/monitoring/powershell';
import {
  parseDevices,
  parseDiskLayout,
  parseProcessSnapshot,
  parseServices,
  parseTasks,
  WindowsInstrumentation,
} from '../src/monitoring/windows-instrumentation';
import { CollectorUnavailableError } from '../src/common/errors';
import { Logger } from '../src/common/logger';
import { makeTempDir, quietLogger } from './helpers';

type Route = [marker: string, response: string | Error];

function scriptedRunner(routes: Route[]): { runner: PowerShellRunner; scripts: string[] } {
  const scripts: string[] = [];
  const runner: PowerShellRunner = async (script) => {
    scripts.push(script);
    const route = routes.find(([marker]) => script.includes(marker));
    if (!route) throw new Error('unexpected script');
    const response = route[1];
    if (response instanceof Error) throw response;
    return response;
  };
  return { runner, scripts };
}

let tmpDir: string;
let logger: Logger;

beforeEach(() => {
  tmpDir = makeTempDir('instr');
  logger = quietLogger(path.join(tmpDir, 'logs'));
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

// ============================================
// PARSERS
// ============================================

describe('parseServices', () => {
  it('accepts a single collapsed object', () => {
    const services = parseServices({
      name: 'AcmeBackup',
      display_name: 'Acme Backup',
      state: 'Running',
      start_mode: 'Auto',
      binary_path: 'C:\\Acme\\backup.exe',
      publisher: '',
    });
    expect(services).toEqual([{
      name: 'AcmeBackup',
      display_name: 'Acme Backup',
      state: 'Running',
      start_mode: 'Auto',
      binary_path: 'C:\\Acme\\backup.exe',
      publisher: null,
    }]);
  });
});

describe('parseProcessSnapshot', () => {
  it('keeps unreadable counters as null and drops the idle process', () => {
    const snapshot = parseProcessSnapshot({
      taken_at_ms: 5000,
      processes: [
        { pid: 0, name: 'Idle', cpu_seconds: 1, working_set_bytes: 8 },
        { pid: 4, name: 'System', cpu_seconds: null, working_set_bytes: 1024, read_bytes: null, write_bytes: 7 },
      ],
    });
    expect(snapshot).toEqual({
      taken_at_ms: 5000,
      processes: [{ pid: 4, name: 'System', cpu_seconds: null, working_set_bytes: 1024, read_bytes: null, write_bytes: 7 }],
    });
  });

  it('rejects a snapshot without a timestamp', () => {
    expect(() => parseProcessSnapshot({ processes: [] })).toThrow(CollectorUnavailableError);
  });
});

describe('parseDiskLayout', () => {
  it('skips volumes without a size and keeps a failed drive map as null', () => {
    const layout = parseDiskLayout({
      volumes: [
        { drive: 'c:', size_bytes: 1000, free_bytes: 250 },
        { drive: 'D:', size_bytes: null, free_bytes: null },
      ],
      drive_map: null,
    });
    expect(layout).toEqual({ volumes: [{ drive: 'C:', size_bytes: 1000, free_bytes: 250 }], drive_map: null });
  });
});

describe('parseDevices', () => {
  it('joins signature info by device id, ignoring case', () => {
    const devices = parseDevices({
      devices: [
        { name: 'Acme NIC', device_id: 'PCI\\VEN_1234&DEV_0001', status: 'Error', error_code: 10 },
        { name: 'Root Hub', device_id: 'USB\\ROOT_HUB', status: 'OK', error_code: 0 },
      ],
      signed_drivers: { device_id: 'pci\\ven_1234&dev_0001', is_signed: false, driver_version: '2.0', provider: 'Acme' },
    });

    expect(devices[0]).toEqual({
      name: 'Acme NIC',
      device_id: 'PCI\\VEN_1234&DEV_0001',
      status: 'Error',
      error_code: 10,
      is_signed: false,
      driver_version: '2.0',
      provider: 'Acme',
    });
    expect(devices[1].is_signed).toBe(true);
    expect(devices[1].provider).toBeNull();
  });

  it('marks signatures Unknown when the signed-driver query failed', () => {
    const devices = parseDevices({
      devices: [{ name: 'Root Hub', device_id: 'USB\\ROOT_HUB', status: 'OK', error_code: 0 }],
      signed_drivers: null,
    });
    expect(devices[0].is_signed).toBeNull();
  });
});

describe('parseTasks', () => {
  it('maps trigger classes and repetition intervals', () => {
    const tasks = parseTasks([{
      name: 'Updater',
      task_path: '\\Acme\\',
      state: 'Ready',
      author: 'Acme',
      triggers: [
        { class: 'MSFT_TaskLogonTrigger', enabled: true, interval: null },
        { class: 'MSFT_TaskTimeTrigger', enabled: false, interval: 'PT15M' },
        { class: 'MSFT_TaskEventTrigger', enabled: true, interval: '' },
      ],
    }]);

    expect(tasks[0].triggers).toEqual([
      { kind: 'logon', enabled: true, interval_seconds: null },
      { kind: 'schedule', enabled: false, interval_seconds: 900 },
      { kind: 'other', enabled: true, interval_seconds: null },
    ]);
  });
});

// ============================================
// QUERIES
// ============================================

describe('WindowsInstrumentation.listStartupEntries', () => {
  function makeStartupFolder(): string {
    const appData = path.join(tmpDir, 'AppData');
    const folder = path.join(appData, 'Microsoft', 'Windows', 'Start Menu', 'Programs', 'Startup');
    fs.mkdirSync(folder, { recursive: true });
    fs.writeFileSync(path.join(folder, 'Tool.exe'), '');
    fs.writeFileSync(path.join(folder, 'App.lnk'), '');
    fs.writeFileSync(path.join(folder, 'readme.txt'), '');
    return appData;
  }

  it('combines Run keys with startup-folder files and resolves shortcuts', async () => {
    const appData = makeStartupFolder();
    const { runner } = scriptedRunner([
      ['GetValueNames', JSON.stringify([{ name: 'Discord', command: 'C:\\Discord\\Update.exe', source: 'HKCU\\Run' }])],
      ['WScript.Shell', JSON.stringify({ index: 0, target: 'C:\\Apps\\app.exe' })],
    ]);
    const instrumentation = new WindowsInstrumentation(logger, { runner, env: { APPDATA: appData } });

    const entries = await instrumentation.listStartupEntries({ elevated: false });

    expect(entries.map(e => [e.name, e.source, e.target_path])).toEqual([
      ['Discord', 'HKCU\\Run', null],
      ['App', 'User Startup Folder', 'C:\\Apps\\app.exe'],
      ['Tool', 'User Startup Folder', null],
    ]);
  });

  it('still lists folder entries when the registry query fails', async () => {
    const appData = makeStartupFolder();
    const { runner } = scriptedRunner([
      ['GetValueNames', new Error('Access denied')],
      ['WScript.Shell', '[]'],
    ]);
    const instrumentation = new WindowsInstrumentation(logger, { runner, env: { APPDATA: appData } });

    const entries = await instrumentation.listStartupEntries({ elevated: false });
    expect(entries.map(e => e.name)).toEqual(['App', 'Tool']);
  });

  it('fails when no startup location can be read', async () => {
    const { runner } = scriptedRunner([['GetValueNames', new Error('Access denied')]]);
    const instrumentation = new WindowsInstrumentation(logger, { runner, env: {} });

    await expect(instrumentation.listStartupEntries({ elevated: false }))
      .rejects.toThrow('No startup location could be read');
  });
});

describe('WindowsInstrumentation.readDiskState', () => {
  const layout = JSON.stringify({
    volumes: [{ drive: 'C:', size_bytes: 1000, free_bytes: 40 }],
    drive_map: [{ drive: 'C:', pnp_device_id: 'SCSI\\DISK&VEN_ACME\\4&1' }],
  });

  it('skips failure prediction when not elevated', async () => {
    const { runner, scripts } = scriptedRunner([['Win32_LogicalDisk', layout]]);
    const instrumentation = new WindowsInstrumentation(logger, { runner, env: {} });

    const state = await instrumentation.readDiskState({ elevated: false });

    expect(scripts).toHaveLength(1);
    expect(state.failure_predictions).toBeNull();
    expect(state.volumes).toEqual([{ drive: 'C:', size_bytes: 1000, free_bytes: 40 }]);
  });

  it('reads failure prediction when elevated', async () => {
    const { runner } = scriptedRunner([
      ['MSStorageDriver_FailurePredictStatus', JSON.stringify({ instance_name: 'SCSI\\Disk&Ven_Acme\\4&1_0', predict_failure: true })],
      ['Win32_LogicalDisk', layout],
    ]);
    const instrumentation = new WindowsInstrumentation(logger, { runner, env: {} });

    const state = await instrumentation.readDiskState({ elevated: true });
    expect(state.failure_predictions).toEqual([{ instance_name: 'SCSI\\Disk&Ven_Acme\\4&1_0', predict_failure: true }]);
  });

  it('reports failure prediction as unavailable when its query fails', async () => {
    const { runner } = scriptedRunner([
      ['MSStorageDriver_FailurePredictStatus', new Error('Not supported')],
      ['Win32_LogicalDisk', layout],
    ]);
    const instrumentation = new WindowsInstrumentation(logger, { runner, env: {} });

    const state = await instrumentation.readDiskState({ elevated: true });
    expect(state.failure_predictions).toBeNull();
  });

  it('sums each temp location once', async () => {
    const temp = path.join(tmpDir, 'Temp');
    fs.mkdirSync(path.join(temp, 'sub'), { recursive: true });
    fs.writeFileSync(path.join(temp, 'a.tmp'), Buffer.alloc(100));
    fs.writeFileSync(path.join(temp, 'sub', 'b.tmp'), Buffer.alloc(50));

    const { runner } = scriptedRunner([['Win32_LogicalDisk', layout]]);
    const instrumentation = new WindowsInstrumentation(logger, {
      runner,
      env: { TEMP: temp, TMP: `${temp}${path.sep}`, SystemRoot: path.join(tmpDir, 'missing') },
    });

    const state = await instrumentation.readDiskState({ elevated: false });
    expect(state.temp_locations).toEqual([{ path: temp, drive: null, bytes: 150 }]);
  });

  it('reports unknown temp bytes when a temp location is not a readable directory', async () => {
    const temp = path.join(tmpDir, 'Temp');
    fs.writeFileSync(temp, 'not a directory');

    const instrumentation = new WindowsInstrumentation(logger, {
      env: { TEMP: temp, SystemRoot: path.join(tmpDir, 'missing') },
    });

    await expect(instrumentation.measureTempLocations()).resolves.toEqual([{ path: temp, drive: null, bytes: null }]);
  });

  it('fails the disk domain when the volume query prints nothing', async () => {
    const { runner } = scriptedRunner([['Win32_LogicalDisk', '']]);
    const instrumentation = new WindowsInstrumentation(logger, { runner, env: {} });

    await expect(instrumentation.readDiskState({ elevated: false })).rejects.toThrow('Volume query returned unreadable output');
  });
});

describe('unreadable query output', () => {
  const outputs: Array<[label: string, stdout: string]> = [
    ['empty', ''],
    ['truncated', 'WARNING: truncated {"name":'],
  ];

  it.each(outputs)('marks services unavailable on %s output', async (_label, stdout) => {
    const { runner } = scriptedRunner([['Win32_Service', stdout]]);
    const instrumentation = new WindowsInstrumentation(logger, { runner, env: {} });

    const error = await instrumentation.listAutoStartServices({ elevated: false }).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(CollectorUnavailableError);
    expect(error).toHaveProperty('category', 'Service');
    expect(error).toHaveProperty('message', 'Service query returned unreadable output');
  });

  it.each(outputs)('marks scheduled tasks unavailable on %s output', async (_label, stdout) => {
    const { runner } = scriptedRunner([['Get-ScheduledTask', stdout]]);
    const instrumentation = new WindowsInstrumentation(logger, { runner, env: {} });

    await expect(instrumentation.listTasks({ elevated: false }))
      .rejects.toThrow('Scheduled task query returned unreadable output');
  });

  it.each(outputs)('treats %s Run key output as an unreadable location', async (_label, stdout) => {
    const { runner } = scriptedRunner([['GetValueNames', stdout]]);
    const instrumentation = new WindowsInstrumentation(logger, { runner, env: {} });

    await expect(instrumentation.listStartupEntries({ elevated: false }))
      .rejects.toThrow('No startup location could be read');
  });

  it('accepts an empty list as a successful query', async () => {
    const { runner } = scriptedRunner([['Win32_Service', '[]']]);
    const instrumentation = new WindowsInstrumentation(logger, { runner, env: {} });

    await expect(instrumentation.listAutoStartServices({ elevated: false })).resolves.toEqual([]);
  });
});

describe('WindowsInstrumentation.listTasks / listDevices', () => {
  it('parses the task list from the query output', async () => {
    const { runner } = scriptedRunner([['Get-ScheduledTask', JSON.stringify([
      { name: 'Sync', task_path: '\\Acme\\', state: 'Ready', author: null, triggers: { class: 'MSFT_TaskBootTrigger', enabled: true } },
    ])]]);
    const instrumentation = new WindowsInstrumentation(logger, { runner, env: {} });

    const tasks = await instrumentation.listTasks({ elevated: false });
    expect(tasks).toEqual([{
      name: 'Sync',
      task_path: '\\Acme\\',
      state: 'Ready',
      author: null,
      triggers: [{ kind: 'boot', enabled: true, interval_seconds: null }],
    }]);
  });

  it('propagates a failed device query', async () => {
    const { runner } = scriptedRunner([['Win32_PnPEntity', new Error('RPC server unavailable')]]);
    const instrumentation = new WindowsInstrumentation(logger, { runner, env: {} });

    await expect(instrumentation.listDevices({ elevated: false })).rejects.toThrow('RPC server unavailable');
  });
});
