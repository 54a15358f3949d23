#!/usr/bin/env node
// cli.ts - system-diagnostic command line entry point
import { ConfigError, errorMessage } from './common/errors';
import { DEFAULT_CONFIG_FILE, DiagnosticConfig, loadConfig } from './config/config';
import { DiagnosticApp } from './diagnostic-app';
import { renderTextSummary } from './reporting';
import { ScanMode } from './types';

export const USAGE = `Usage: system-diagnostic [--quick|--full] [--config <path>] [--out <dir>]

  --quick          Run the quick category set (default: startup programs and processes)
  --full           Run every category
  --config <path>  Configuration file (default: ${DEFAULT_CONFIG_FILE})
  --out <dir>      Directory for report files
  --help           Show this message`;

export interface CliOptions {
  mode?: ScanMode;
  configPath: string;
  outDir?: string;
  help: boolean;
}

export function parseCliArgs(argv: readonly string[]): CliOptions {
  const options: CliOptions = { configPath: DEFAULT_CONFIG_FILE, help: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--quick':
      case '--full': {
        const mode: ScanMode = arg === '--quick' ? 'quick' : 'full';
        if (options.mode !== undefined && options.mode !== mode) {
          throw new ConfigError('--quick and --full cannot be combined');
        }
        options.mode = mode;
        break;
      }
      case '--config':
      case '--out': {
        const value = argv[i + 1];
        if (value === undefined || value.startsWith('--')) {
          throw new ConfigError(`${arg} needs a value`);
        }
        if (arg === '--config') {
          options.configPath = value;
        } else {
          options.outDir = value;
        }
        i++;
        break;
      }
      case '--help':
      case '-h':
        options.help = true;
        break;
      default:
        throw new ConfigError(`Unknown argument: ${arg}`);
    }
  }

  return options;
}

export async function main(argv: readonly string[]): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (error) {
    console.error(errorMessage(error));
    console.error(USAGE);
    return 2;
  }

  if (options.help) {
    console.log(USAGE);
    return 0;
  }

  let config: DiagnosticConfig;
  try {
    config = loadConfig(options.configPath);
  } catch (error) {
    console.error(`Invalid configuration: ${errorMessage(error)}`);
    return 2;
  }
  if (options.outDir) {
    config.reports.dir = options.outDir;
  }

  const app = new DiagnosticApp(config);
  const onSignal = (): void => {
    console.error('\nCancelling scan...');
    app.stop();
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  try {
    const run = await app.start(options.mode ?? config.scan.mode);
    console.log(renderTextSummary(run.scan));
    if (run.reports.length > 0) {
      console.log(`\nReports:\n${run.reports.map(f => `  ${f}`).join('\n')}`);
    }
    return 0;
  } catch (error) {
    app.getLogger().critical('Scan did not complete', error);
    console.error(`Scan failed: ${errorMessage(error)}`);
    return 1;
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
  }
}

if (require.main === module) {
  main(process.argv.slice(2))
    .then(code => {
      process.exitCode = code;
    })
    .catch(error => {
      console.error('Fatal error:', error);
      process.exitCode = 1;
    });
}
