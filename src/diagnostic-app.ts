// diagnostic-app.ts - Wires config, logging, instrumentation, scan and reports together
import { Logger } from './common/logger';
import { errorMessage } from './common/errors';
import { DiagnosticConfig } from './config/config';
import { createCollectors } from './collectors';
import { PowerShellRunner, runPowerShell } from './monitoring/powershell';
import { detectElevation } from './monitoring/privilege';
import { DiagnosticSources } from './monitoring/sources';
import { createWindowsSources } from './monitoring/windows-instrumentation';
import { ScanOrchestrator } from './scan/scan-orchestrator';
import { ReportUploader, ScanUploader, writeReports } from './reporting';
import { ScanMode, ScanResult } from './types';

export interface DiagnosticAppDeps {
  logger?: Logger;
  runner?: PowerShellRunner;
  sources?: DiagnosticSources;
  uploader?: ScanUploader;
}

export interface DiagnosticRun {
  scan: ScanResult;
  reports: string[];
  uploaded: boolean;
}

export class DiagnosticApp {
  private logger: Logger;
  private config: DiagnosticConfig;
  private runner: PowerShellRunner;
  private sources: DiagnosticSources;
  private uploader: ScanUploader | null;
  private orchestrator: ScanOrchestrator | null = null;
  private stopped = false;

  constructor(config: DiagnosticConfig, deps: DiagnosticAppDeps = {}) {
    this.config = config;
    this.logger = deps.logger ?? new Logger('diagnostic', config.logging.dir, {
      minLevel: config.logging.level,
      console: config.logging.console,
    });
    this.runner = deps.runner ?? runPowerShell;
    this.sources = deps.sources ?? createWindowsSources(this.logger.child('instrumentation'), { runner: this.runner });

    if (deps.uploader) {
      this.uploader = deps.uploader;
    } else if (config.server.enabled) {
      this.uploader = new ReportUploader(config.server, this.logger.child('upload'));
    } else {
      this.uploader = null;
    }
  }

  async resolveElevation(): Promise<boolean> {
    const setting = this.config.scan.elevated;
    if (setting !== 'auto') return setting;
    return detectElevation(this.logger, this.runner);
  }

  /** Run one scan, then write the configured reports and upload when enabled. */
  async start(mode: ScanMode = this.config.scan.mode): Promise<DiagnosticRun> {
    const elevated = await this.resolveElevation();
    if (!elevated) {
      this.logger.warn('Not running elevated: drive failure prediction and some driver details will be Unknown');
    }

    const collectors = createCollectors(this.sources, this.logger.child('collector'), {
      sampleWindowMs: this.config.scan.processSampleWindowMs,
      topN: this.config.scan.processTopN,
    });
    const orchestrator = new ScanOrchestrator(collectors, this.logger.child('scan'));
    this.orchestrator = orchestrator;
    if (this.stopped) {
      orchestrator.cancel();
    }

    const scan = await orchestrator.run({
      mode,
      elevated,
      quickCategories: this.config.scan.quickCategories,
      timeoutsMs: this.config.scan.timeoutsMs,
    });

    const reports = await writeReports(scan, this.config.reports);
    for (const file of reports) {
      this.logger.info('Report written', { file });
    }

    let uploaded = false;
    if (this.uploader) {
      try {
        await this.uploader.upload(scan);
        uploaded = true;
      } catch (error) {
        // The local reports are already on disk
        this.logger.warn('Scan report not uploaded', { error: errorMessage(error) });
      }
    }

    return { scan, reports, uploaded };
  }

  /** Cancel the scan in flight; a scan started afterwards is cancelled immediately. */
  stop(): void {
    this.stopped = true;
    this.orchestrator?.cancel('Scan cancelled by user');
  }

  getLogger(): Logger {
    return this.logger;
  }
}
