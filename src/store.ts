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

export interface ReadOpts {
  /** Take a row lock held until the surrounding transaction ends. */
  forUpdate?: boolean;
}

export type ProjectPatch = Partial<
  Pick<Project, 'title' | 'description' | 'expectedHourlyRateCents' | 'expectedDurationHours' | 'tags'>
>;

export interface SubmissionFields {
  solutionHandle: string;
  timeSpentHours: number;
  submittedAt: number;
}

/**
 * Transaction-scoped view of the workflow tables. Every method runs inside the
 * transaction that produced it; status-changing writes are compare-and-set and report
 * whether the expected prior status still held.
 */
export interface WorkflowTx {
  getProject(id: string, opts?: ReadOpts): Promise<Project | undefined>;
  insertProject(project: Project): Promise<void>;
  updateProject(id: string, patch: ProjectPatch, now: number): Promise<Project | undefined>;
  setProjectStatus(id: string, from: ProjectStatus, to: ProjectStatus, now: number): Promise<boolean>;
  listProjectsByOwner(ownerId: string): Promise<Project[]>;

  getProposal(id: string, opts?: ReadOpts): Promise<Proposal | undefined>;
  insertProposal(proposal: Proposal): Promise<void>;
  listProposalsByProject(projectId: string): Promise<Proposal[]>;
  listProposalsByDeveloper(developerId: string): Promise<Proposal[]>;
  /** A pending or accepted proposal by this developer on this project. */
  findActiveProposal(projectId: string, developerId: string): Promise<Proposal | undefined>;
  findAcceptedProposal(projectId: string): Promise<Proposal | undefined>;
  setProposalStatus(id: string, from: ProposalStatus, to: ProposalStatus, now: number): Promise<boolean>;
  /** Rejects every pending proposal of the project except `exceptId`; returns how many. */
  rejectPendingProposals(projectId: string, exceptId: string, now: number): Promise<number>;

  getTask(id: string, opts?: ReadOpts): Promise<Task | undefined>;
  insertTask(task: Task): Promise<void>;
  listTasksByProject(projectId: string): Promise<Task[]>;
  listTasksByDeveloper(developerId: string): Promise<Task[]>;
  listTasksByBuyer(buyerId: string): Promise<Task[]>;
  setTaskStatus(id: string, from: TaskStatus, to: TaskStatus, now: number): Promise<Task | undefined>;
  /** in_progress -> submitted, setting the solution fields in the same write. */
  recordSubmission(id: string, fields: SubmissionFields): Promise<Task | undefined>;

  /** Fails with invalid_state when the task already has a payment. */
  insertPayment(payment: Payment): Promise<void>;
  getPayment(id: string): Promise<Payment | undefined>;
  getPaymentByTask(taskId: string): Promise<Payment | undefined>;
  listPaymentsByBuyer(buyerId: string): Promise<Payment[]>;

  insertAuditEvent(evt: AuditEvent): Promise<void>;
  listAuditEvents(targetId: string): Promise<AuditEvent[]>;

  summarize(): Promise<WorkflowSummary>;
}

export interface WorkflowStore {
  /** Commits when `fn` resolves, rolls back on every thrown error. */
  transaction<T>(fn: (tx: WorkflowTx) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}

export type StoreBackend = 'postgres' | 'memory';

export function storeBackendFromEnv(): StoreBackend {
  const raw = String(process.env.STORE_BACKEND ?? 'postgres').trim().toLowerCase();
  if (raw === 'postgres' || raw === 'memory') return raw;
  throw new Error(`Unsupported STORE_BACKEND: ${raw}`);
}

export async function createStoreFromEnv(): Promise<WorkflowStore> {
  const backend = storeBackendFromEnv();
  if (backend === 'memory') {
    const { MemoryStore } = await import('./memoryStore.js');
    return new MemoryStore();
  }
  const { PgStore } = await import('./db/pgStore.js');
  const store = new PgStore();
  const res = await store.migrate();
  console.log(`[db] migrations applied=${res.applied.length} skipped=${res.skipped.length}`);
  return store;
}

export function emptySummary(): WorkflowSummary {
  return {
    projects: { open: 0, closed: 0 },
    proposals: { pending: 0, accepted: 0, rejected: 0, withdrawn: 0 },
    tasks: { assigned: 0, in_progress: 0, submitted: 0, paid: 0 },
    payments: 0,
    paidCentsTotal: 0,
    hoursLogged: 0,
  };
}
