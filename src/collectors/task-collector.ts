// task-collector.ts - Scheduled tasks with startup or frequent triggers
import { Logger } from '../common/logger';
import { buildFinding, isThirdPartyTask } from '../detection/classifier';
import { RawTask, TaskSource } from '../monitoring/sources';
import { FindingOf, ScheduledTaskMetrics } from '../types';
import { BaseCollector, CollectContext } from './base-collector';

export function taskMetrics(task: RawTask): ScheduledTaskMetrics {
  const active = task.triggers.filter(t => t.enabled);
  const intervals = active
    .map(t => t.interval_seconds)
    .filter((s): s is number => s !== null && s > 0);

  return {
    name: task.name,
    task_path: task.task_path,
    state: task.state,
    author: task.author,
    runs_at_logon: active.some(t => t.kind === 'logon'),
    runs_at_boot: active.some(t => t.kind === 'boot'),
    min_interval_seconds: intervals.length > 0 ? Math.min(...intervals) : null,
  };
}

export function taskIdentifier(task: Pick<RawTask, 'task_path' | 'name'>): string {
  const folder = task.task_path.endsWith('\\') ? task.task_path : `${task.task_path}\\`;
  return `${folder}${task.name}`;
}

export class TaskCollector extends BaseCollector<'ScheduledTask'> {
  readonly category = 'ScheduledTask' as const;
  private source: TaskSource;

  constructor(source: TaskSource, logger: Logger) {
    super(logger);
    this.source = source;
  }

  protected async gather(context: CollectContext): Promise<FindingOf<'ScheduledTask'>[]> {
    const tasks = await this.source.listTasks(context);
    const findings: FindingOf<'ScheduledTask'>[] = [];

    for (const task of tasks) {
      const metrics = taskMetrics(task);
      // The \Microsoft\ tree holds hundreds of maintenance tasks; only its startup ones matter here
      if (!isThirdPartyTask(metrics) && !metrics.runs_at_logon && !metrics.runs_at_boot) continue;
      findings.push(buildFinding('ScheduledTask', taskIdentifier(task), metrics));
    }

    return findings;
  }
}
