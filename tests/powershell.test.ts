import { EventEmitter } from 'events';
import { PassThrough } from 'stream';
import { ChildLike, createPowerShellRunner, psQuote, SpawnLike } from '../src/monitoring/powershell';
import { PowerShellError, ScanCancelledError } from '../src/common/errors';

class FakeChild extends EventEmitter implements ChildLike {
  stdout = new PassThrough();
  stderr = new PassThrough();
  killed = false;

  kill(): boolean {
    this.killed = true;
    return true;
  }

  /** Emit output, then close once the stream data has been delivered. */
  finish(code: number, stdout = '', stderr = ''): void {
    if (stdout) this.stdout.write(stdout);
    if (stderr) this.stderr.write(stderr);
    setImmediate(() => this.emit('close', code));
  }
}

interface SpawnCall {
  command: string;
  args: readonly string[];
  options: { windowsHide: boolean; shell: boolean };
}

function fakeSpawn(): { spawn: SpawnLike; calls: SpawnCall[]; children: FakeChild[] } {
  const calls: SpawnCall[] = [];
  const children: FakeChild[] = [];
  const spawn: SpawnLike = (command, args, options) => {
    calls.push({ command, args, options });
    const child = new FakeChild();
    children.push(child);
    return child;
  };
  return { spawn, calls, children };
}

describe('createPowerShellRunner', () => {
  it('runs the script as an encoded command without a shell', async () => {
    const fake = fakeSpawn();
    const run = createPowerShellRunner(fake.spawn);

    const pending = run("Get-Service -Name 'Spooler'");
    fake.children[0].finish(0, '{"ok":true}');

    await expect(pending).resolves.toBe('{"ok":true}');
    const call = fake.calls[0];
    expect(call.command).toBe('powershell.exe');
    expect(call.args.slice(0, 5)).toEqual(['-NoProfile', '-NonInteractive', '-ExecutionPolicy', 'Bypass', '-EncodedCommand']);
    expect(Buffer.from(call.args[5], 'base64').toString('utf16le')).toBe("Get-Service -Name 'Spooler'");
    expect(call.options).toEqual({ windowsHide: true, shell: false });
  });

  it('rejects with the stderr text on a non-zero exit', async () => {
    const fake = fakeSpawn();
    const pending = createPowerShellRunner(fake.spawn)('Get-Thing');
    fake.children[0].finish(1, '', 'Access denied');

    await expect(pending).rejects.toThrow('PowerShell error: Access denied');
    await expect(pending).rejects.toBeInstanceOf(PowerShellError);
  });

  it('resolves a non-zero exit that wrote nothing to stderr', async () => {
    const fake = fakeSpawn();
    const pending = createPowerShellRunner(fake.spawn)('exit 1');
    fake.children[0].finish(1, 'partial');

    await expect(pending).resolves.toBe('partial');
  });

  it('rejects when the process cannot be started', async () => {
    const fake = fakeSpawn();
    const pending = createPowerShellRunner(fake.spawn)('Get-Thing');
    fake.children[0].emit('error', new Error('spawn powershell.exe ENOENT'));

    await expect(pending).rejects.toThrow('PowerShell execution failed: spawn powershell.exe ENOENT');
  });

  it('kills the process and rejects after the timeout', async () => {
    const fake = fakeSpawn();
    const pending = createPowerShellRunner(fake.spawn)('Start-Sleep 60', { timeout: 20 });

    await expect(pending).rejects.toThrow('PowerShell timed out after 20ms');
    expect(fake.children[0].killed).toBe(true);
  });

  it('kills the process and rejects with the abort reason', async () => {
    const fake = fakeSpawn();
    const controller = new AbortController();
    const pending = createPowerShellRunner(fake.spawn)('Start-Sleep 60', { signal: controller.signal });

    controller.abort(new ScanCancelledError('user stop'));

    await expect(pending).rejects.toThrow('user stop');
    expect(fake.children[0].killed).toBe(true);
  });

  it('does not start a process for an already aborted signal', async () => {
    const fake = fakeSpawn();
    const controller = new AbortController();
    controller.abort(new ScanCancelledError());

    await expect(createPowerShellRunner(fake.spawn)('Get-Thing', { signal: controller.signal }))
      .rejects.toBeInstanceOf(ScanCancelledError);
    expect(fake.calls).toHaveLength(0);
  });
});

describe('psQuote', () => {
  it('doubles embedded single quotes', () => {
    expect(psQuote("C:\\Users\\o'brien\\Start Menu")).toBe("'C:\\Users\\o''brien\\Start Menu'");
  });
});
