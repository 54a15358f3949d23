// privilege.ts - Elevation check for the current session
import { Logger } from '../common/logger';
import { PowerShellRunner, runPowerShell } from './powershell';

const ELEVATION_SCRIPT = `
  $principal = New-Object System.Security.Principal.WindowsPrincipal([System.Security.Principal.WindowsIdentity]::GetCurrent())
  $principal.IsInRole([System.Security.Principal.WindowsBuiltInRole]::Administrator)
`;

/**
 * True when the process runs with an administrator token. Anything that
 * prevents the check from running counts as not elevated.
 */
export async function detectElevation(logger: Logger, runner: PowerShellRunner = runPowerShell): Promise<boolean> {
  try {
    const stdout = await runner(ELEVATION_SCRIPT, { timeout: 10000 });
    return stdout.trim().toLowerCase() === 'true';
  } catch (error) {
    logger.warn('Cannot determine privilege level, assuming not elevated', undefined, error);
    return false;
  }
}
