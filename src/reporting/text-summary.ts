// text-summary.ts - Console rendering of a finished scan
import { formatDuration } from '../common/format';
import { CATEGORIES, ScanResult } from '../types';

const CATEGORY_LABELS = {
  Startup: 'Startup programs',
  Service: 'Services',
  Process: 'Processes',
  Disk: 'Disks',
  Driver: 'Drivers',
  ScheduledTask: 'Scheduled tasks',
} as const;

export function categoryLabel(category: keyof typeof CATEGORY_LABELS): string {
  return CATEGORY_LABELS[category];
}

export function renderTextSummary(scan: ScanResult): string {
  const { summary } = scan;
  const counts = summary.counts_by_severity;
  const lines: string[] = [];

  lines.push(`System diagnostic (${scan.mode} scan) on ${scan.hostname}`);
  lines.push(`Started ${scan.started_at}, took ${formatDuration(scan.duration_ms)}${scan.elevated ? '' : ', not elevated'}`);
  lines.push('');
  lines.push(`Critical: ${counts.Critical}  Warning: ${counts.Warning}  OK: ${counts.OK}  Indeterminate: ${summary.indeterminate}`);
  lines.push('');

  for (const category of CATEGORIES) {
    const result = scan.per_category[category];
    if (!result) continue;

    const label = categoryLabel(category).padEnd(16);
    if (result.failure) {
      lines.push(`  ${label} not evaluated (${result.failure.kind}: ${result.failure.message})`);
      continue;
    }

    const c = summary.counts_by_category[category];
    const detail = c
      ? `${c.critical} critical, ${c.warning} warning, ${c.ok} ok${c.indeterminate > 0 ? `, ${c.indeterminate} indeterminate` : ''}`
      : 'no findings';
    lines.push(`  ${label} ${detail}`);
  }

  if (summary.recommendations.length > 0) {
    lines.push('');
    lines.push('Recommendations:');
    summary.recommendations.forEach((rec, i) => {
      lines.push(`  ${i + 1}. [${rec.severity}] ${rec.action_text}`);
    });
  }

  return lines.join('\n');
}
