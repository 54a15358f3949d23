// json-report.ts - Machine-readable scan export
import { promises as fs } from 'fs';
import path from 'path';
import { ScanResult } from '../types';

/** `diagnostic-HOST-2026-01-02T03-04-05-678Z` */
export function reportBaseName(scan: Pick<ScanResult, 'hostname' | 'timestamp'>): string {
  const host = scan.hostname.replace(/[^A-Za-z0-9_-]/g, '_') || 'host';
  const stamp = scan.timestamp.replace(/[:.]/g, '-');
  return `diagnostic-${host}-${stamp}`;
}

export function renderJson(scan: ScanResult): string {
  return JSON.stringify(scan, null, 2);
}

export async function writeJson(scan: ScanResult, outDir: string): Promise<string> {
  await fs.mkdir(outDir, { recursive: true });
  const file = path.join(outDir, `${reportBaseName(scan)}.json`);
  await fs.writeFile(file, renderJson(scan), 'utf8');
  return file;
}
