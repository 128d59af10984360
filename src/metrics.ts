import type { WorkflowStore } from './store.js';

const counters = new Map<string, number>();

const COUNTERS: Array<[key: string, help: string]> = [
  ['requests_total', 'HTTP requests received'],
  ['proposal_submitted_total', 'Proposals submitted'],
  ['proposal_accepted_total', 'Proposals accepted (hires)'],
  ['task_assigned_total', 'Tasks assigned'],
  ['task_submitted_total', 'Solutions submitted'],
  ['payment_recorded_total', 'Payments recorded'],
  ['payment_cents_total', 'Cents recorded in the payment ledger'],
  ['release_granted_total', 'Solution downloads released'],
  ['release_denied_total', 'Solution downloads refused for lack of payment'],
];

export function inc(name: string, by = 1) {
  counters.set(name, (counters.get(name) ?? 0) + by);
}

export function counterValue(name: string): number {
  return counters.get(name) ?? 0;
}

export function resetCounters() {
  counters.clear();
}

function promLine(name: string, value: number, labels?: Record<string, string>) {
  const labelStr =
    labels && Object.keys(labels).length
      ? '{' +
        Object.entries(labels)
          .map(([k, v]) => `${k}="${String(v).replaceAll('"', '\\"')}"`)
          .join(',') +
        '}'
      : '';
  return `${name}${labelStr} ${value}\n`;
}

export async function renderPrometheusMetrics(store: WorkflowStore): Promise<string> {
  let out = '';

  for (const [key, help] of COUNTERS) {
    out += `# HELP paidwork_${key} ${help}\n`;
    out += `# TYPE paidwork_${key} counter\n`;
    out += promLine(`paidwork_${key}`, counters.get(key) ?? 0);
  }

  const summary = await store.transaction((tx) => tx.summarize());

  out += '# TYPE paidwork_projects gauge\n';
  for (const [status, n] of Object.entries(summary.projects)) out += promLine('paidwork_projects', n, { status });

  out += '# TYPE paidwork_proposals gauge\n';
  for (const [status, n] of Object.entries(summary.proposals)) out += promLine('paidwork_proposals', n, { status });

  out += '# TYPE paidwork_tasks gauge\n';
  for (const [status, n] of Object.entries(summary.tasks)) out += promLine('paidwork_tasks', n, { status });

  out += '# TYPE paidwork_payments gauge\n';
  out += promLine('paidwork_payments', summary.payments);

  out += '# TYPE paidwork_paid_cents gauge\n';
  out += promLine('paidwork_paid_cents', summary.paidCentsTotal);

  out += '# TYPE paidwork_hours_logged gauge\n';
  out += promLine('paidwork_hours_logged', summary.hoursLogged);

  return out;
}
