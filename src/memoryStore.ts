import { invalidState } from './errors.js';
import { emptySummary, type ProjectPatch, type SubmissionFields, type WorkflowStore, type WorkflowTx } from './store.js';
import type {
  AuditEvent,
  Payment,
  Project,
  ProjectStatus,
  Proposal,
  ProposalStatus,
  Task,
  TaskStatus,
  WorkflowSummary,
} from './types.js';

interface MemoryState {
  projects: Map<string, Project>;
  proposals: Map<string, Proposal>;
  tasks: Map<string, Task>;
  payments: Map<string, Payment>;
  paymentByTask: Map<string, string>;
  audit: AuditEvent[];
}

function emptyState(): MemoryState {
  return {
    projects: new Map(),
    proposals: new Map(),
    tasks: new Map(),
    payments: new Map(),
    paymentByTask: new Map(),
    audit: [],
  };
}

const newestFirst = <T extends { createdAt: number }>(rows: T[]) => rows.sort((a, b) => b.createdAt - a.createdAt);

class MemoryTx implements WorkflowTx {
  constructor(private readonly s: MemoryState) {}

  async getProject(id: string): Promise<Project | undefined> {
    const row = this.s.projects.get(id);
    return row ? structuredClone(row) : undefined;
  }

  async insertProject(project: Project): Promise<void> {
    if (this.s.projects.has(project.id)) throw new Error(`duplicate project id ${project.id}`);
    this.s.projects.set(project.id, structuredClone(project));
  }

  async updateProject(id: string, patch: ProjectPatch, now: number): Promise<Project | undefined> {
    const row = this.s.projects.get(id);
    if (!row) return undefined;
    Object.assign(row, structuredClone(patch), { updatedAt: now });
    return structuredClone(row);
  }

  async setProjectStatus(id: string, from: ProjectStatus, to: ProjectStatus, now: number): Promise<boolean> {
    const row = this.s.projects.get(id);
    if (!row || row.status !== from) return false;
    row.status = to;
    row.updatedAt = now;
    return true;
  }

  async listProjectsByOwner(ownerId: string): Promise<Project[]> {
    return newestFirst([...this.s.projects.values()].filter((p) => p.ownerId === ownerId).map((p) => structuredClone(p)));
  }

  async getProposal(id: string): Promise<Proposal | undefined> {
    const row = this.s.proposals.get(id);
    return row ? structuredClone(row) : undefined;
  }

  async insertProposal(proposal: Proposal): Promise<void> {
    if (this.s.proposals.has(proposal.id)) throw new Error(`duplicate proposal id ${proposal.id}`);
    this.s.proposals.set(proposal.id, structuredClone(proposal));
  }

  async listProposalsByProject(projectId: string): Promise<Proposal[]> {
    return newestFirst(this.proposalsWhere((p) => p.projectId === projectId));
  }

  async listProposalsByDeveloper(developerId: string): Promise<Proposal[]> {
    return newestFirst(this.proposalsWhere((p) => p.developerId === developerId));
  }

  async findActiveProposal(projectId: string, developerId: string): Promise<Proposal | undefined> {
    return this.proposalsWhere(
      (p) => p.projectId === projectId && p.developerId === developerId && (p.status === 'pending' || p.status === 'accepted')
    )[0];
  }

  async findAcceptedProposal(projectId: string): Promise<Proposal | undefined> {
    return this.proposalsWhere((p) => p.projectId === projectId && p.status === 'accepted')[0];
  }

  async setProposalStatus(id: string, from: ProposalStatus, to: ProposalStatus, now: number): Promise<boolean> {
    const row = this.s.proposals.get(id);
    if (!row || row.status !== from) return false;
    row.status = to;
    row.decidedAt = now;
    return true;
  }

  async rejectPendingProposals(projectId: string, exceptId: string, now: number): Promise<number> {
    let n = 0;
    for (const row of this.s.proposals.values()) {
      if (row.projectId !== projectId || row.id === exceptId || row.status !== 'pending') continue;
      row.status = 'rejected';
      row.decidedAt = now;
      n += 1;
    }
    return n;
  }

  async getTask(id: string): Promise<Task | undefined> {
    const row = this.s.tasks.get(id);
    return row ? structuredClone(row) : undefined;
  }

  async insertTask(task: Task): Promise<void> {
    if (this.s.tasks.has(task.id)) throw new Error(`duplicate task id ${task.id}`);
    this.s.tasks.set(task.id, structuredClone(task));
  }

  async listTasksByProject(projectId: string): Promise<Task[]> {
    return newestFirst(this.tasksWhere((t) => t.projectId === projectId));
  }

  async listTasksByDeveloper(developerId: string): Promise<Task[]> {
    return newestFirst(this.tasksWhere((t) => t.developerId === developerId));
  }

  async listTasksByBuyer(buyerId: string): Promise<Task[]> {
    return newestFirst(this.tasksWhere((t) => t.buyerId === buyerId));
  }

  async setTaskStatus(id: string, from: TaskStatus, to: TaskStatus, now: number): Promise<Task | undefined> {
    const row = this.s.tasks.get(id);
    if (!row || row.status !== from) return undefined;
    row.status = to;
    row.updatedAt = now;
    return structuredClone(row);
  }

  async recordSubmission(id: string, fields: SubmissionFields): Promise<Task | undefined> {
    const row = this.s.tasks.get(id);
    if (!row || row.status !== 'in_progress') return undefined;
    row.status = 'submitted';
    row.solutionHandle = fields.solutionHandle;
    row.timeSpentHours = fields.timeSpentHours;
    row.submittedAt = fields.submittedAt;
    row.updatedAt = fields.submittedAt;
    return structuredClone(row);
  }

  async insertPayment(payment: Payment): Promise<void> {
    // Mirrors the unique(task_id) constraint of the payments table.
    if (this.s.paymentByTask.has(payment.taskId)) throw invalidState('payment_already_recorded');
    this.s.payments.set(payment.id, structuredClone(payment));
    this.s.paymentByTask.set(payment.taskId, payment.id);
  }

  async getPayment(id: string): Promise<Payment | undefined> {
    const row = this.s.payments.get(id);
    return row ? structuredClone(row) : undefined;
  }

  async getPaymentByTask(taskId: string): Promise<Payment | undefined> {
    const id = this.s.paymentByTask.get(taskId);
    return id === undefined ? undefined : this.getPayment(id);
  }

  async listPaymentsByBuyer(buyerId: string): Promise<Payment[]> {
    return newestFirst([...this.s.payments.values()].filter((p) => p.buyerId === buyerId).map((p) => structuredClone(p)));
  }

  async insertAuditEvent(evt: AuditEvent): Promise<void> {
    this.s.audit.push(structuredClone(evt));
  }

  async listAuditEvents(targetId: string): Promise<AuditEvent[]> {
    return this.s.audit.filter((e) => e.targetId === targetId).map((e) => structuredClone(e));
  }

  async summarize(): Promise<WorkflowSummary> {
    const out = emptySummary();
    for (const p of this.s.projects.values()) out.projects[p.status] += 1;
    for (const p of this.s.proposals.values()) out.proposals[p.status] += 1;
    for (const t of this.s.tasks.values()) {
      out.tasks[t.status] += 1;
      out.hoursLogged += t.timeSpentHours ?? 0;
    }
    for (const p of this.s.payments.values()) {
      out.payments += 1;
      out.paidCentsTotal += p.amountCents;
    }
    return out;
  }

  private proposalsWhere(pred: (p: Proposal) => boolean): Proposal[] {
    return [...this.s.proposals.values()].filter(pred).map((p) => structuredClone(p));
  }

  private tasksWhere(pred: (t: Task) => boolean): Task[] {
    return [...this.s.tasks.values()].filter(pred).map((t) => structuredClone(t));
  }
}

/**
 * Process-local store for tests and demos. Transactions run one at a time; a
 * transaction that throws leaves no trace because the state is restored from the
 * snapshot taken when it started.
 */
export class MemoryStore implements WorkflowStore {
  private state: MemoryState = emptyState();
  private tail: Promise<void> = Promise.resolve();

  async transaction<T>(fn: (tx: WorkflowTx) => Promise<T>): Promise<T> {
    const run = this.tail.then(() => this.runExclusive(fn));
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  async close(): Promise<void> {
    await this.tail;
  }

  reset() {
    this.state = emptyState();
  }

  private async runExclusive<T>(fn: (tx: WorkflowTx) => Promise<T>): Promise<T> {
    const snapshot = structuredClone(this.state);
    try {
      return await fn(new MemoryTx(this.state));
    } catch (err) {
      this.state = snapshot;
      throw err;
    }
  }
}
