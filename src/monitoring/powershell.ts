// powershell.ts - Cancellable PowerShell execution for instrumentation queries
import { spawn } from 'child_process';
import { EventEmitter } from 'events';
import { Readable } from 'stream';
import { PowerShellError } from '../common/errors';
import { abortReason } from '../common/abort';

export const DEFAULT_POWERSHELL_TIMEOUT_MS = 30000;

export interface PowerShellOptions {
  timeout?: number;
  signal?: AbortSignal;
}

export type PowerShellRunner = (script: string, options?: PowerShellOptions) => Promise<string>;

export interface ChildLike extends EventEmitter {
  stdout: Readable;
  stderr: Readable;
  kill(signal?: NodeJS.Signals | number): boolean;
}

export type SpawnLike = (
  command: string,
  args: readonly string[],
  options: { windowsHide: boolean; shell: boolean }
) => ChildLike;

/**
 * Build a runner around a spawn function. Scripts go through -EncodedCommand,
 * never through a shell, so paths and names embedded in them cannot inject.
 */
export function createPowerShellRunner(spawnFn: SpawnLike = spawn): PowerShellRunner {
  return (script: string, options: PowerShellOptions = {}) => {
    const timeout = options.timeout ?? DEFAULT_POWERSHELL_TIMEOUT_MS;
    const signal = options.signal;
    const encodedCommand = Buffer.from(script, 'utf16le').toString('base64');

    return new Promise<string>((resolve, reject) => {
      if (signal?.aborted) {
        reject(abortReason(signal));
        return;
      }

      const child = spawnFn('powershell.exe', [
        '-NoProfile',
        '-NonInteractive',
        '-ExecutionPolicy', 'Bypass',
        '-EncodedCommand', encodedCommand
      ], {
        windowsHide: true,
        shell: false
      });

      let stdout = '';
      let stderr = '';
      let settled = false;

      const settle = (error: Error | null): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        if (error) {
          reject(error);
        } else {
          resolve(stdout);
        }
      };

      const onAbort = (): void => {
        child.kill();
        if (signal) settle(abortReason(signal));
      };

      const timer = setTimeout(() => {
        child.kill();
        settle(new PowerShellError(`PowerShell timed out after ${timeout}ms`, null, stderr));
      }, timeout);

      signal?.addEventListener('abort', onAbort, { once: true });

      child.stdout.setEncoding('utf8');
      child.stderr.setEncoding('utf8');
      child.stdout.on('data', (chunk: string) => { stdout += chunk; });
      child.stderr.on('data', (chunk: string) => { stderr += chunk; });

      child.on('error', (err: Error) => {
        settle(new PowerShellError(`PowerShell execution failed: ${err.message}`, null));
      });

      child.on('close', (code: number | null) => {
        if (code !== 0 && stderr.trim()) {
          settle(new PowerShellError(`PowerShell error: ${stderr.trim().substring(0, 500)}`, code, stderr));
        } else {
          settle(null);
        }
      });
    });
  };
}

export const runPowerShell: PowerShellRunner = createPowerShellRunner();

/** Single-quoted PowerShell string literal. */
export function psQuote(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}
