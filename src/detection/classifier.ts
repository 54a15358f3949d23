// classifier.ts - Severity rules for every diagnostic category
//
// Everything here is a pure function of (category, metrics). Thresholds are
// strict: a value sitting exactly on a threshold stays in the lower tier.

import {
  Category,
  CategoryMetrics,
  Classification,
  DiskMetrics,
  DriverMetrics,
  FindingOf,
  ImpactLabel,
  ProcessMetrics,
  ScheduledTaskMetrics,
  ServiceMetrics,
  Severity,
  StartupMetrics,
} from '../types';
import { formatBytes, formatInterval, formatPercent } from '../common/format';
import { describeDriverErrorCode, lookupStartupImpact, matchesMicrosoftServicePattern } from './lookup-tables';

export const PROCESS_THRESHOLDS = {
  cpuCritical: 50,
  cpuWarning: 20,
  memoryCriticalBytes: 2e9,
  memoryWarningBytes: 1e9,
} as const;

export const DISK_THRESHOLDS = {
  freeCriticalPercent: 5,
  freeWarningPercent: 10,
  tempWarningBytes: 500e6,
} as const;

export const TASK_FREQUENT_INTERVAL_SECONDS = 3600;

const UNKNOWN_NOTES: Record<string, string> = {
  cpu_percent: 'CPU usage unavailable',
  memory_bytes: 'memory usage unavailable',
  free_percent: 'free space unavailable',
  failure_predicted: 'failure prediction unavailable',
  temp_bytes: 'temporary file size unavailable',
  error_code: 'device error code unavailable',
  is_signed: 'driver signature unavailable',
};

function impactForSeverity(severity: Severity): ImpactLabel {
  switch (severity) {
    case 'Critical': return 'High';
    case 'Warning': return 'Medium';
    default: return 'Low';
  }
}

function unknownKeys<T extends object>(metrics: T, required: ReadonlyArray<keyof T & string>): string[] {
  return required.filter(key => metrics[key] === null);
}

function withUnknownNotes(description: string, unknown: string[]): string {
  if (unknown.length === 0) return description;
  const notes = unknown.map(key => UNKNOWN_NOTES[key] ?? `${key} unavailable`);
  return `${description}; ${notes.join('; ')}`;
}

function finish(
  severity: Severity,
  description: string,
  unknown: string[],
  isThirdParty: boolean | null,
  impact: ImpactLabel = impactForSeverity(severity),
): Classification {
  return {
    severity,
    impact_label: impact,
    description: withUnknownNotes(description, unknown),
    // An Unknown only matters when the known metrics did not already flag the item
    indeterminate: severity === 'OK' && unknown.length > 0,
    unknown_metrics: unknown,
    is_third_party: isThirdParty,
  };
}

// ============================
// PROCESSES
// ============================

export function classifyProcess(m: ProcessMetrics): Classification {
  const unknown = unknownKeys(m, ['cpu_percent', 'memory_bytes']);
  const cpu = m.cpu_percent;
  const mem = m.memory_bytes;
  const t = PROCESS_THRESHOLDS;

  let severity: Severity = 'OK';
  if ((cpu !== null && cpu > t.cpuCritical) || (mem !== null && mem > t.memoryCriticalBytes)) {
    severity = 'Critical';
  } else if ((cpu !== null && cpu > t.cpuWarning) || (mem !== null && mem > t.memoryWarningBytes)) {
    severity = 'Warning';
  }

  const usage = `CPU ${cpu === null ? 'unknown' : formatPercent(cpu)}, memory ${mem === null ? 'unknown' : formatBytes(mem)}`;
  const lead = {
    Critical: 'Excessive resource usage',
    Warning: 'Elevated resource usage',
    OK: 'Normal resource usage',
  }[severity];

  return finish(severity, `${lead}: ${usage}`, unknown, null);
}

// ============================
// DISKS
// ============================

export function classifyDisk(m: DiskMetrics): Classification {
  const unknown = unknownKeys(m, ['free_percent', 'failure_predicted', 'temp_bytes']);
  const free = m.free_percent;
  const temp = m.temp_bytes;
  const t = DISK_THRESHOLDS;

  const critical: string[] = [];
  if (free !== null && free < t.freeCriticalPercent) critical.push(`Free space critically low (${formatPercent(free)} free)`);
  if (m.failure_predicted === true) critical.push('Drive failure predicted');

  const warning: string[] = [];
  if (free !== null && free < t.freeWarningPercent) warning.push(`Free space low (${formatPercent(free)} free)`);
  if (temp !== null && temp > t.tempWarningBytes) warning.push(`Temporary files use ${formatBytes(temp)}`);

  if (critical.length > 0) return finish('Critical', critical.join('; '), unknown, null);
  if (warning.length > 0) return finish('Warning', warning.join('; '), unknown, null);

  const parts = [free === null ? null : `${formatPercent(free)} free`];
  if (m.failure_predicted === false) parts.push('no failure predicted');
  const description = parts.filter((p): p is string => p !== null).join(', ') || 'Drive state unavailable';
  return finish('OK', description, unknown, null);
}

// ============================
// DRIVERS
// ============================

export function classifyDriver(m: DriverMetrics): Classification {
  const unknown = unknownKeys(m, ['error_code', 'is_signed']);
  const thirdParty = m.provider === null ? null : !/microsoft/i.test(m.provider);

  if (m.error_code !== null && m.error_code !== 0) {
    const text = describeDriverErrorCode(m.error_code) ?? 'Device error';
    return finish('Critical', `${text} (code ${m.error_code})`, [], thirdParty);
  }

  if (m.is_signed === false) {
    const version = m.driver_version ? ` (v${m.driver_version})` : '';
    return finish('Warning', `Unsigned driver${version}`, unknown, thirdParty);
  }

  const description = m.status === 'OK' || m.status === '' ? 'Device working normally' : `Device status: ${m.status}`;
  return finish('OK', description, unknown, thirdParty);
}

// ============================
// SERVICES
// ============================

export function isMicrosoftPublisher(publisher: string): boolean {
  return /microsoft/i.test(publisher);
}

export function isThirdPartyService(m: Pick<ServiceMetrics, 'name' | 'display_name' | 'publisher'>): boolean {
  if (m.publisher !== null && m.publisher.trim() !== '') {
    return !isMicrosoftPublisher(m.publisher);
  }
  return !matchesMicrosoftServicePattern(m.name, m.display_name);
}

function isAutoStart(startMode: string): boolean {
  return /^auto/i.test(startMode.trim());
}

export function classifyService(m: ServiceMetrics): Classification {
  const thirdParty = isThirdPartyService(m);
  const state = m.state || 'Unknown';

  if (thirdParty && isAutoStart(m.start_mode)) {
    // Stopped services are listed but not flagged
    if (state.toLowerCase() === 'stopped') {
      return finish('OK', 'Third-party auto-start service (Stopped)', [], true);
    }
    const from = m.publisher ? ` from ${m.publisher}` : '';
    return finish('Warning', `Third-party service${from} starts automatically (${state})`, [], true);
  }

  if (!thirdParty) {
    return finish('OK', `Microsoft service (${state})`, [], false);
  }
  return finish('OK', `${m.start_mode || 'Manual'} start service (${state})`, [], true);
}

// ============================
// SCHEDULED TASKS
// ============================

export function isThirdPartyTask(m: Pick<ScheduledTaskMetrics, 'task_path' | 'author'>): boolean {
  if (m.task_path.toLowerCase().startsWith('\\microsoft\\')) return false;
  if (m.author !== null && /microsoft/i.test(m.author)) return false;
  return true;
}

export function classifyScheduledTask(m: ScheduledTaskMetrics): Classification {
  const thirdParty = isThirdPartyTask(m);
  const enabled = m.state.toLowerCase() !== 'disabled';

  const reasons: string[] = [];
  if (m.runs_at_logon) reasons.push('runs at logon');
  if (m.runs_at_boot) reasons.push('runs at startup');
  if (m.min_interval_seconds !== null && m.min_interval_seconds < TASK_FREQUENT_INTERVAL_SECONDS) {
    reasons.push(`repeats every ${formatInterval(m.min_interval_seconds)}`);
  }

  if (!enabled) {
    return finish('OK', 'Task disabled', [], thirdParty);
  }
  if (thirdParty && reasons.length > 0) {
    return finish('Warning', `Third-party task ${reasons.join(', ')}`, [], true);
  }
  if (!thirdParty) {
    const detail = reasons.length > 0 ? ` ${reasons.join(', ')}` : '';
    return finish('OK', `Microsoft task${detail}`, [], false);
  }
  return finish('OK', 'Third-party task without startup or frequent triggers', [], true);
}

// ============================
// STARTUP
// ============================

const STARTUP_DESCRIPTIONS: Record<ImpactLabel, string> = {
  High: 'High impact on startup time',
  Medium: 'Moderate impact on startup time',
  Low: 'Low impact on startup time',
};

export function classifyStartup(m: StartupMetrics): Classification {
  const impact = lookupStartupImpact(m.name, m.command);
  // No Critical tier for startup entries
  const severity: Severity = impact === 'High' ? 'Warning' : 'OK';
  return finish(severity, STARTUP_DESCRIPTIONS[impact], [], null, impact);
}

// ============================
// DISPATCH
// ============================

const CLASSIFIERS: { [C in Category]: (metrics: CategoryMetrics[C]) => Classification } = {
  Startup: classifyStartup,
  Service: classifyService,
  Process: classifyProcess,
  Disk: classifyDisk,
  Driver: classifyDriver,
  ScheduledTask: classifyScheduledTask,
};

export function classify<C extends Category>(category: C, metrics: CategoryMetrics[C]): Classification {
  const rule: (metrics: CategoryMetrics[C]) => Classification = CLASSIFIERS[category];
  return rule(metrics);
}

export function buildFinding<C extends Category>(category: C, identifier: string, metrics: CategoryMetrics[C]): FindingOf<C> {
  return {
    category,
    identifier,
    metrics,
    ...classify(category, metrics),
  };
}
