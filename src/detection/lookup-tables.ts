// lookup-tables.ts - Maintained name tables used by the classifier
import startupImpact from '../../data/startup-impact.json';
import microsoftServicePatterns from '../../data/microsoft-service-patterns.json';
import driverErrorCodes from '../../data/driver-error-codes.json';
import { ImpactLabel } from '../types';

const HIGH_IMPACT_APPS: readonly string[] = startupImpact.high;
const MEDIUM_IMPACT_APPS: readonly string[] = startupImpact.medium;
const MS_SERVICE_PATTERNS: readonly string[] = microsoftServicePatterns;
const DRIVER_ERROR_DESCRIPTIONS: Record<string, string> = driverErrorCodes;

/**
 * Startup impact by substring match on the entry name or its command.
 * Resource-heavy apps win over the helper/updater patterns.
 */
export function lookupStartupImpact(name: string, command: string): ImpactLabel {
  const haystacks = [name.toLowerCase(), command.toLowerCase()];
  const matches = (needle: string) => haystacks.some(h => h.includes(needle));

  if (HIGH_IMPACT_APPS.some(matches)) return 'High';
  if (MEDIUM_IMPACT_APPS.some(matches)) return 'Medium';
  return 'Low';
}

export function matchesMicrosoftServicePattern(name: string, displayName: string): boolean {
  const combined = (name + displayName).toLowerCase();
  return MS_SERVICE_PATTERNS.some(pattern => combined.includes(pattern));
}

export function describeDriverErrorCode(code: number): string | undefined {
  return DRIVER_ERROR_DESCRIPTIONS[String(code)];
}

export function knownDriverErrorCodes(): number[] {
  return Object.keys(DRIVER_ERROR_DESCRIPTIONS).map(Number).sort((a, b) => a - b);
}
