// Type definitions shared by collectors, classifier, orchestrator and reports

export type Category = 'Startup' | 'Service' | 'Process' | 'Disk' | 'Driver' | 'ScheduledTask';
export type Severity = 'OK' | 'Warning' | 'Critical';
export type ImpactLabel = 'Low' | 'Medium' | 'High';
export type ScanMode = 'quick' | 'full';

export const CATEGORIES: readonly Category[] = ['Startup', 'Service', 'Process', 'Disk', 'Driver', 'ScheduledTask'];

export const SEVERITY_RANK: Record<Severity, number> = {
  OK: 0,
  Warning: 1,
  Critical: 2
};

// Lower value sorts first: worst-case consequence of each domain
export const CATEGORY_PRIORITY: Record<Category, number> = {
  Disk: 0,
  Driver: 1,
  Process: 2,
  Service: 3,
  ScheduledTask: 4,
  Startup: 5
};

/** `null` marks a metric that could not be read (usually a privilege problem). */
export type Unknown = null;

// ============================
// PER-CATEGORY METRICS
// ============================

export interface StartupMetrics {
  name: string;
  command: string;
  source: string;
  resolved_path: string;
}

export interface ServiceMetrics {
  name: string;
  display_name: string;
  state: string;
  start_mode: string;
  binary_path: string | Unknown;
  publisher: string | Unknown;
}

export interface ProcessMetrics {
  pid: number;
  name: string;
  cpu_percent: number | Unknown;
  memory_bytes: number | Unknown;
  disk_read_bytes: number | Unknown;
  disk_write_bytes: number | Unknown;
}

export interface DiskMetrics {
  drive: string;
  total_bytes: number;
  free_bytes: number;
  free_percent: number | Unknown;
  failure_predicted: boolean | Unknown;
  temp_bytes: number | Unknown;
}

export interface DriverMetrics {
  name: string;
  device_id: string;
  status: string;
  error_code: number | Unknown;
  is_signed: boolean | Unknown;
  driver_version: string | Unknown;
  provider: string | Unknown;
}

export interface ScheduledTaskMetrics {
  name: string;
  task_path: string;
  state: string;
  author: string | Unknown;
  runs_at_logon: boolean;
  runs_at_boot: boolean;
  // Shortest repetition interval; null when no trigger repeats (not an Unknown)
  min_interval_seconds: number | null;
}

export interface CategoryMetrics {
  Startup: StartupMetrics;
  Service: ServiceMetrics;
  Process: ProcessMetrics;
  Disk: DiskMetrics;
  Driver: DriverMetrics;
  ScheduledTask: ScheduledTaskMetrics;
}

// ============================
// FINDINGS
// ============================

export interface Classification {
  severity: Severity;
  impact_label: ImpactLabel;
  description: string;
  indeterminate: boolean;
  unknown_metrics: string[];
  // null where the domain has no vendor/OS distinction
  is_third_party: boolean | null;
}

export interface FindingOf<C extends Category> extends Classification {
  category: C;
  identifier: string;
  metrics: CategoryMetrics[C];
}

export type Finding = { [C in Category]: FindingOf<C> }[Category];

export type FailureKind = 'unavailable' | 'timeout' | 'cancelled';

export interface CollectorFailure {
  kind: FailureKind;
  message: string;
}

export interface CollectorResult<C extends Category = Category> {
  category: C;
  findings: FindingOf<C>[];
  failure?: CollectorFailure;
  duration_ms: number;
}

// ============================
// SUMMARY / SCAN RESULT
// ============================

export interface CategoryCounts {
  ok: number;
  warning: number;
  critical: number;
  indeterminate: number;
}

export interface Recommendation {
  severity: Severity;
  category: Category;
  identifier: string;
  action_text: string;
}

export interface Summary {
  counts_by_severity: Record<Severity, number>;
  counts_by_category: Partial<Record<Category, CategoryCounts>>;
  not_evaluated: Category[];
  indeterminate: number;
  recommendations: Recommendation[];
}

export interface ScanResult {
  mode: ScanMode;
  timestamp: string;
  started_at: string;
  completed_at: string;
  duration_ms: number;
  elevated: boolean;
  hostname: string;
  per_category: Partial<Record<Category, CollectorResult>>;
  summary: Summary;
}

export function isCategory(value: unknown): value is Category {
  return typeof value === 'string' && (CATEGORIES as readonly string[]).includes(value);
}
