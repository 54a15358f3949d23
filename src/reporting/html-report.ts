// html-report.ts - Self-contained HTML export of a scan
import { promises as fs } from 'fs';
import path from 'path';
import { formatDuration } from '../common/format';
import { CATEGORIES, Category, Finding, FindingOf, ScanResult, Severity } from '../types';
import { reportBaseName } from './json-report';
import { categoryLabel } from './text-summary';

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

const SEVERITY_CLASS: Record<Severity, string> = {
  OK: 'ok',
  Warning: 'warn',
  Critical: 'crit',
};

function severityBadge(finding: Pick<Finding, 'severity' | 'indeterminate'>): string {
  if (finding.indeterminate) {
    return '<span class="badge unknown">Indeterminate</span>';
  }
  return `<span class="badge ${SEVERITY_CLASS[finding.severity]}">${finding.severity}</span>`;
}

function thirdPartyCell(value: boolean | null): string {
  if (value === null) return '';
  return value ? 'Third-party' : 'Microsoft';
}

function findingRow(finding: FindingOf<Category>): string {
  return `<tr>
        <td>${severityBadge(finding)}</td>
        <td>${escapeHtml(finding.identifier)}</td>
        <td>${escapeHtml(finding.description)}</td>
        <td>${finding.impact_label}</td>
        <td>${thirdPartyCell(finding.is_third_party)}</td>
      </tr>`;
}

function categorySection(scan: ScanResult): string {
  const sections: string[] = [];

  for (const category of CATEGORIES) {
    const result = scan.per_category[category];
    if (!result) continue;

    const title = escapeHtml(categoryLabel(category));
    if (result.failure) {
      sections.push(`<section>
    <h2>${title}</h2>
    <p class="failure">Not evaluated: ${escapeHtml(result.failure.message)} (${result.failure.kind})</p>
  </section>`);
      continue;
    }

    const rows = result.findings.length > 0
      ? result.findings.map(findingRow).join('\n      ')
      : '<tr><td colspan="5">No findings</td></tr>';

    sections.push(`<section>
    <h2>${title} <small>${result.findings.length} items, ${formatDuration(result.duration_ms)}</small></h2>
    <table>
      <thead><tr><th>Severity</th><th>Item</th><th>Details</th><th>Impact</th><th>Publisher</th></tr></thead>
      <tbody>
      ${rows}
      </tbody>
    </table>
  </section>`);
  }

  return sections.join('\n  ');
}

export function renderHtml(scan: ScanResult): string {
  const { summary } = scan;
  const counts = summary.counts_by_severity;

  const recommendations = summary.recommendations.length > 0
    ? `<ol class="recs">
      ${summary.recommendations.map(r =>
        `<li><span class="badge ${SEVERITY_CLASS[r.severity]}">${r.severity}</span> ${escapeHtml(r.action_text)}</li>`).join('\n      ')}
    </ol>`
    : '<p>No action needed.</p>';

  const notEvaluated = summary.not_evaluated.length > 0
    ? `<p class="failure">Not evaluated: ${summary.not_evaluated.map(c => escapeHtml(categoryLabel(c))).join(', ')}</p>`
    : '';

  return `<!doctype html>
<html lang="en">
<head>
  <meta charset="utf-8"/>
  <meta name="viewport" content="width=device-width, initial-scale=1"/>
  <title>System diagnostic - ${escapeHtml(scan.hostname)}</title>
  <style>
    body{margin:0;font-family:system-ui,Segoe UI,Roboto,Helvetica,Arial,sans-serif;color:#0f172a;background:#f1f5f9}
    .page{max-width:1120px;margin:0 auto;padding:32px 24px}
    .meta{color:#475569;font-size:13px}
    .kpis{display:flex;gap:16px;margin:20px 0}
    .kpi{background:#fff;border-radius:12px;padding:16px 20px;box-shadow:0 4px 12px #00000010}
    .kpi b{display:block;font-size:28px}
    section{background:#fff;border-radius:12px;padding:20px;margin:16px 0;box-shadow:0 4px 12px #00000010}
    h2 small{font-weight:400;color:#64748b;font-size:13px}
    table{width:100%;border-collapse:collapse;font-size:14px}
    th,td{text-align:left;padding:6px 8px;border-bottom:1px solid #e2e8f0;vertical-align:top}
    .badge{font-size:12px;padding:1px 8px;border-radius:999px;border:1px solid}
    .ok{background:#dcfce7;color:#166534;border-color:#bbf7d0}
    .warn{background:#fef9c3;color:#854d0e;border-color:#fde68a}
    .crit{background:#fee2e2;color:#b91c1c;border-color:#fecaca}
    .unknown{background:#e2e8f0;color:#334155;border-color:#cbd5e1}
    .failure{color:#b91c1c}
    .recs li{margin:6px 0}
  </style>
</head>
<body>
<div class="page">
  <h1>System diagnostic</h1>
  <div class="meta">${escapeHtml(scan.hostname)} &middot; ${scan.mode} scan &middot; ${escapeHtml(scan.started_at)} &middot; ${formatDuration(scan.duration_ms)}${scan.elevated ? '' : ' &middot; not elevated'}</div>
  <div class="kpis">
    <div class="kpi crit"><b>${counts.Critical}</b>Critical</div>
    <div class="kpi warn"><b>${counts.Warning}</b>Warning</div>
    <div class="kpi ok"><b>${counts.OK}</b>OK</div>
    <div class="kpi unknown"><b>${summary.indeterminate}</b>Indeterminate</div>
  </div>
  ${notEvaluated}
  <section>
    <h2>Recommendations</h2>
    ${recommendations}
  </section>
  ${categorySection(scan)}
</div>
</body>
</html>
`;
}

export async function writeHtml(scan: ScanResult, outDir: string): Promise<string> {
  await fs.mkdir(outDir, { recursive: true });
  const file = path.join(outDir, `${reportBaseName(scan)}.html`);
  await fs.writeFile(file, renderHtml(scan), 'utf8');
  return file;
}
