// index.ts - Write every configured report format for a scan
import path from 'path';
import { promises as fs } from 'fs';
import { ReportsConfig } from '../config/config';
import { ScanResult } from '../types';
import { reportBaseName, writeJson } from './json-report';
import { writeHtml } from './html-report';
import { renderTextSummary } from './text-summary';

export async function writeReports(scan: ScanResult, config: ReportsConfig): Promise<string[]> {
  const written: string[] = [];

  for (const format of config.formats) {
    switch (format) {
      case 'json':
        written.push(await writeJson(scan, config.dir));
        break;
      case 'html':
        written.push(await writeHtml(scan, config.dir));
        break;
      case 'text': {
        await fs.mkdir(config.dir, { recursive: true });
        const file = path.join(config.dir, `${reportBaseName(scan)}.txt`);
        await fs.writeFile(file, renderTextSummary(scan) + '\n', 'utf8');
        written.push(file);
        break;
      }
    }
  }

  return written;
}

export { renderJson, writeJson, reportBaseName } from './json-report';
export { renderHtml, writeHtml, escapeHtml } from './html-report';
export { renderTextSummary } from './text-summary';
export { ReportUploader, REPORTS_ENDPOINT } from './report-uploader';
export type { ScanUploader, UploadReceipt } from './report-uploader';
