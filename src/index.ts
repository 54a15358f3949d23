// index.ts - Public API of the diagnostic engine
export * from './types';
export {
  DiagnosticError,
  CollectorUnavailableError,
  CollectorTimeoutError,
  ScanCancelledError,
  ScanStateError,
  PowerShellError,
  ConfigError,
} from './common/errors';
export { Logger, LogLevel } from './common/logger';
export { loadConfig, resolveConfig, defaultConfig } from './config/config';
export type { DiagnosticConfig, ScanConfig, ReportFormat } from './config/config';
export { classify, buildFinding, PROCESS_THRESHOLDS, DISK_THRESHOLDS } from './detection/classifier';
export { createCollectors } from './collectors';
export type { Collector, CollectContext, DomainCollector } from './collectors';
export type { DiagnosticSources } from './monitoring/sources';
export { createWindowsSources } from './monitoring/windows-instrumentation';
export { detectElevation } from './monitoring/privilege';
export { ScanOrchestrator, selectCategories, DEFAULT_TIMEOUTS_MS, DEFAULT_QUICK_CATEGORIES } from './scan/scan-orchestrator';
export type { ScanOptions, ScanState } from './scan/scan-orchestrator';
export { buildSummary } from './scan/aggregator';
export { renderJson, renderHtml, renderTextSummary, writeReports, ReportUploader } from './reporting';
export { DiagnosticApp } from './diagnostic-app';
