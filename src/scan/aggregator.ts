// aggregator.ts - Fold collector results into counts and ranked recommendations
import {
  CATEGORY_PRIORITY,
  Category,
  CategoryCounts,
  CollectorResult,
  Recommendation,
  SEVERITY_RANK,
  Severity,
  Summary,
} from '../types';

type ActionTier = Exclude<Severity, 'OK'>;

const ACTION_TEMPLATES: Record<Category, Record<ActionTier, (identifier: string) => string>> = {
  Disk: {
    Critical: id => `Back up the data on ${id} now, then free space or replace the drive`,
    Warning: id => `Free up space on ${id} by clearing temporary files and removing unused programs`,
  },
  Driver: {
    Critical: id => `Reinstall or update the driver for ${id} and check the device in Device Manager`,
    Warning: id => `Replace the unsigned driver for ${id} with a signed release from the vendor`,
  },
  Process: {
    Critical: id => `Investigate ${id}; close or restart it if the load is unexpected`,
    Warning: id => `Keep an eye on ${id} for sustained resource usage`,
  },
  Service: {
    Critical: id => `Stop and disable ${id} if it is not required`,
    Warning: id => `Review whether ${id} needs to start automatically; set it to Manual if not`,
  },
  ScheduledTask: {
    Critical: id => `Disable the scheduled task ${id} if it is not required`,
    Warning: id => `Review the scheduled task ${id} and disable it if it is not required`,
  },
  Startup: {
    Critical: id => `Remove ${id} from startup`,
    Warning: id => `Disable ${id} at startup unless it is needed right after sign-in`,
  },
};

export function actionText(category: Category, severity: ActionTier, identifier: string): string {
  return ACTION_TEMPLATES[category][severity](identifier);
}

function emptyCounts(): CategoryCounts {
  return { ok: 0, warning: 0, critical: 0, indeterminate: 0 };
}

function byPriority(a: Category, b: Category): number {
  return CATEGORY_PRIORITY[a] - CATEGORY_PRIORITY[b];
}

/**
 * Results are processed in category-priority order, so the summary does not
 * depend on the order collectors finished in. Indeterminate findings are
 * counted on their own and never as OK.
 */
export function buildSummary(results: readonly CollectorResult[]): Summary {
  const ordered = [...results].sort((a, b) => byPriority(a.category, b.category));

  const countsBySeverity: Record<Severity, number> = { OK: 0, Warning: 0, Critical: 0 };
  const countsByCategory: Partial<Record<Category, CategoryCounts>> = {};
  const notEvaluated: Category[] = [];
  const ranked: Array<Recommendation & { index: number }> = [];
  let indeterminate = 0;

  for (const result of ordered) {
    if (result.failure) {
      notEvaluated.push(result.category);
      continue;
    }

    const counts = emptyCounts();
    result.findings.forEach((finding, index) => {
      if (finding.indeterminate) {
        indeterminate++;
        counts.indeterminate++;
        return;
      }

      const severity = finding.severity;
      countsBySeverity[severity]++;
      if (severity === 'OK') {
        counts.ok++;
        return;
      }
      if (severity === 'Warning') {
        counts.warning++;
      } else {
        counts.critical++;
      }

      ranked.push({
        severity,
        category: finding.category,
        identifier: finding.identifier,
        action_text: actionText(finding.category, severity, finding.identifier),
        index,
      });
    });
    countsByCategory[result.category] = counts;
  }

  ranked.sort((a, b) =>
    SEVERITY_RANK[b.severity] - SEVERITY_RANK[a.severity]
    || byPriority(a.category, b.category)
    || a.index - b.index);

  return {
    counts_by_severity: countsBySeverity,
    counts_by_category: countsByCategory,
    not_evaluated: notEvaluated,
    indeterminate,
    recommendations: ranked.map(r => ({
      severity: r.severity,
      category: r.category,
      identifier: r.identifier,
      action_text: r.action_text,
    })),
  };
}
