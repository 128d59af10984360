import path from 'path';
import { readdir, readFile } from 'fs/promises';
import { Kysely, PostgresDialect, sql, type PostgresPool, type Selectable } from 'kysely';
import pg, { type Pool } from 'pg';
import { invalidState } from '../errors.js';
import { emptySummary, type ProjectPatch, type ReadOpts, type SubmissionFields, type WorkflowStore, type WorkflowTx } from '../store.js';
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
} from '../types.js';
import type { AuditLogTable, DB, PaymentsTable, ProjectsTable, ProposalsTable, TasksTable } from './types.js';

const UNIQUE_VIOLATION = '23505';
const DEFAULT_DATABASE_URL = 'postgresql://localhost:5432/paidwork';

export interface MigrationResult {
  applied: string[];
  skipped: string[];
}

function wantDbSsl(): boolean {
  const v = String(process.env.DB_SSL ?? '').trim().toLowerCase();
  return v === 'true' || v === '1' || v === 'require';
}

/** Reads DATABASE_URL and DB_SSL at call time, after dotenv has loaded. */
export function createPool(connectionString = process.env.DATABASE_URL ?? DEFAULT_DATABASE_URL): Pool {
  return new pg.Pool({ connectionString, ...(wantDbSsl() ? { ssl: { rejectUnauthorized: false } } : {}) });
}

function ms(d: Date | null): number | undefined {
  return d ? d.getTime() : undefined;
}

function toStringArray(v: unknown): string[] {
  return Array.isArray(v) ? v.filter((x): x is string => typeof x === 'string') : [];
}

function toRecord(v: unknown): Record<string, unknown> {
  return v !== null && typeof v === 'object' && !Array.isArray(v) ? Object.fromEntries(Object.entries(v)) : {};
}

function isUniqueViolation(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === UNIQUE_VIOLATION;
}

function projectFromRow(row: Selectable<ProjectsTable>): Project {
  return {
    id: row.id,
    ownerId: row.owner_id,
    title: row.title,
    description: row.description,
    expectedHourlyRateCents: Number(row.expected_hourly_rate_cents),
    expectedDurationHours: Number(row.expected_duration_hours),
    tags: toStringArray(row.tags),
    status: row.status,
    createdAt: row.created_at.getTime(),
    updatedAt: row.updated_at.getTime(),
  };
}

function proposalFromRow(row: Selectable<ProposalsTable>): Proposal {
  return {
    id: row.id,
    projectId: row.project_id,
    developerId: row.developer_id,
    coverLetter: row.cover_letter,
    proposedHourlyRateCents: Number(row.proposed_hourly_rate_cents),
    estimatedHours: Number(row.estimated_hours),
    status: row.status,
    createdAt: row.created_at.getTime(),
    decidedAt: ms(row.decided_at),
  };
}

function taskFromRow(row: Selectable<TasksTable>): Task {
  return {
    id: row.id,
    projectId: row.project_id,
    developerId: row.developer_id,
    buyerId: row.buyer_id,
    title: row.title,
    description: row.description,
    hourlyRateCents: Number(row.hourly_rate_cents),
    status: row.status,
    solutionHandle: row.solution_handle ?? undefined,
    timeSpentHours: row.time_spent_hours === null ? undefined : Number(row.time_spent_hours),
    submittedAt: ms(row.submitted_at),
    createdAt: row.created_at.getTime(),
    updatedAt: row.updated_at.getTime(),
  };
}

function paymentFromRow(row: Selectable<PaymentsTable>): Payment {
  return {
    id: row.id,
    taskId: row.task_id,
    buyerId: row.buyer_id,
    amountCents: Number(row.amount_cents),
    createdAt: row.created_at.getTime(),
  };
}

function auditFromRow(row: Selectable<AuditLogTable>): AuditEvent {
  return {
    id: row.id,
    actorType: row.actor_type,
    actorId: row.actor_id,
    action: row.action,
    targetType: row.target_type,
    targetId: row.target_id,
    metadata: toRecord(row.metadata),
    createdAt: row.created_at.getTime(),
  };
}

class PgTx implements WorkflowTx {
  constructor(private readonly db: Kysely<DB>) {}

  async getProject(id: string, opts?: ReadOpts): Promise<Project | undefined> {
    let q = this.db.selectFrom('projects').selectAll().where('id', '=', id);
    if (opts?.forUpdate) q = q.forUpdate();
    const row = await q.executeTakeFirst();
    return row ? projectFromRow(row) : undefined;
  }

  async insertProject(p: Project): Promise<void> {
    await this.db
      .insertInto('projects')
      .values({
        id: p.id,
        owner_id: p.ownerId,
        title: p.title,
        description: p.description,
        expected_hourly_rate_cents: p.expectedHourlyRateCents,
        expected_duration_hours: p.expectedDurationHours,
        tags: JSON.stringify(p.tags),
        status: p.status,
        created_at: new Date(p.createdAt),
        updated_at: new Date(p.updatedAt),
      })
      .execute();
  }

  async updateProject(id: string, patch: ProjectPatch, now: number): Promise<Project | undefined> {
    const row = await this.db
      .updateTable('projects')
      .set({
        ...(patch.title !== undefined ? { title: patch.title } : {}),
        ...(patch.description !== undefined ? { description: patch.description } : {}),
        ...(patch.expectedHourlyRateCents !== undefined ? { expected_hourly_rate_cents: patch.expectedHourlyRateCents } : {}),
        ...(patch.expectedDurationHours !== undefined ? { expected_duration_hours: patch.expectedDurationHours } : {}),
        ...(patch.tags !== undefined ? { tags: JSON.stringify(patch.tags) } : {}),
        updated_at: new Date(now),
      })
      .where('id', '=', id)
      .returningAll()
      .executeTakeFirst();
    return row ? projectFromRow(row) : undefined;
  }

  async setProjectStatus(id: string, from: ProjectStatus, to: ProjectStatus, now: number): Promise<boolean> {
    const res = await this.db
      .updateTable('projects')
      .set({ status: to, updated_at: new Date(now) })
      .where('id', '=', id)
      .where('status', '=', from)
      .executeTakeFirst();
    return res.numUpdatedRows > 0n;
  }

  async listProjectsByOwner(ownerId: string): Promise<Project[]> {
    const rows = await this.db
      .selectFrom('projects')
      .selectAll()
      .where('owner_id', '=', ownerId)
      .orderBy('created_at', 'desc')
      .execute();
    return rows.map(projectFromRow);
  }

  async getProposal(id: string, opts?: ReadOpts): Promise<Proposal | undefined> {
    let q = this.db.selectFrom('proposals').selectAll().where('id', '=', id);
    if (opts?.forUpdate) q = q.forUpdate();
    const row = await q.executeTakeFirst();
    return row ? proposalFromRow(row) : undefined;
  }

  async insertProposal(p: Proposal): Promise<void> {
    try {
      await this.db
        .insertInto('proposals')
        .values({
          id: p.id,
          project_id: p.projectId,
          developer_id: p.developerId,
          cover_letter: p.coverLetter,
          proposed_hourly_rate_cents: p.proposedHourlyRateCents,
          estimated_hours: p.estimatedHours,
          status: p.status,
          created_at: new Date(p.createdAt),
          decided_at: null,
        })
        .execute();
    } catch (err) {
      // proposals_one_active_per_developer
      if (isUniqueViolation(err)) throw invalidState('proposal_already_submitted');
      throw err;
    }
  }

  async listProposalsByProject(projectId: string): Promise<Proposal[]> {
    const rows = await this.db
      .selectFrom('proposals')
      .selectAll()
      .where('project_id', '=', projectId)
      .orderBy('created_at', 'desc')
      .execute();
    return rows.map(proposalFromRow);
  }

  async listProposalsByDeveloper(developerId: string): Promise<Proposal[]> {
    const rows = await this.db
      .selectFrom('proposals')
      .selectAll()
      .where('developer_id', '=', developerId)
      .orderBy('created_at', 'desc')
      .execute();
    return rows.map(proposalFromRow);
  }

  async findActiveProposal(projectId: string, developerId: string): Promise<Proposal | undefined> {
    const row = await this.db
      .selectFrom('proposals')
      .selectAll()
      .where('project_id', '=', projectId)
      .where('developer_id', '=', developerId)
      .where('status', 'in', ['pending', 'accepted'])
      .executeTakeFirst();
    return row ? proposalFromRow(row) : undefined;
  }

  async findAcceptedProposal(projectId: string): Promise<Proposal | undefined> {
    const row = await this.db
      .selectFrom('proposals')
      .selectAll()
      .where('project_id', '=', projectId)
      .where('status', '=', 'accepted')
      .executeTakeFirst();
    return row ? proposalFromRow(row) : undefined;
  }

  async setProposalStatus(id: string, from: ProposalStatus, to: ProposalStatus, now: number): Promise<boolean> {
    try {
      const res = await this.db
        .updateTable('proposals')
        .set({ status: to, decided_at: new Date(now) })
        .where('id', '=', id)
        .where('status', '=', from)
        .executeTakeFirst();
      return res.numUpdatedRows > 0n;
    } catch (err) {
      // proposals_one_accepted_per_project
      if (isUniqueViolation(err)) throw invalidState('project_already_hired');
      throw err;
    }
  }

  async rejectPendingProposals(projectId: string, exceptId: string, now: number): Promise<number> {
    const res = await this.db
      .updateTable('proposals')
      .set({ status: 'rejected', decided_at: new Date(now) })
      .where('project_id', '=', projectId)
      .where('id', '!=', exceptId)
      .where('status', '=', 'pending')
      .executeTakeFirst();
    return Number(res.numUpdatedRows);
  }

  async getTask(id: string, opts?: ReadOpts): Promise<Task | undefined> {
    let q = this.db.selectFrom('tasks').selectAll().where('id', '=', id);
    if (opts?.forUpdate) q = q.forUpdate();
    const row = await q.executeTakeFirst();
    return row ? taskFromRow(row) : undefined;
  }

  async insertTask(t: Task): Promise<void> {
    await this.db
      .insertInto('tasks')
      .values({
        id: t.id,
        project_id: t.projectId,
        developer_id: t.developerId,
        buyer_id: t.buyerId,
        title: t.title,
        description: t.description,
        hourly_rate_cents: t.hourlyRateCents,
        status: t.status,
        solution_handle: t.solutionHandle ?? null,
        time_spent_hours: t.timeSpentHours ?? null,
        submitted_at: t.submittedAt === undefined ? null : new Date(t.submittedAt),
        created_at: new Date(t.createdAt),
        updated_at: new Date(t.updatedAt),
      })
      .execute();
  }

  async listTasksByProject(projectId: string): Promise<Task[]> {
    const rows = await this.db.selectFrom('tasks').selectAll().where('project_id', '=', projectId).orderBy('created_at', 'desc').execute();
    return rows.map(taskFromRow);
  }

  async listTasksByDeveloper(developerId: string): Promise<Task[]> {
    const rows = await this.db.selectFrom('tasks').selectAll().where('developer_id', '=', developerId).orderBy('created_at', 'desc').execute();
    return rows.map(taskFromRow);
  }

  async listTasksByBuyer(buyerId: string): Promise<Task[]> {
    const rows = await this.db.selectFrom('tasks').selectAll().where('buyer_id', '=', buyerId).orderBy('created_at', 'desc').execute();
    return rows.map(taskFromRow);
  }

  async setTaskStatus(id: string, from: TaskStatus, to: TaskStatus, now: number): Promise<Task | undefined> {
    const row = await this.db
      .updateTable('tasks')
      .set({ status: to, updated_at: new Date(now) })
      .where('id', '=', id)
      .where('status', '=', from)
      .returningAll()
      .executeTakeFirst();
    return row ? taskFromRow(row) : undefined;
  }

  async recordSubmission(id: string, fields: SubmissionFields): Promise<Task | undefined> {
    const at = new Date(fields.submittedAt);
    const row = await this.db
      .updateTable('tasks')
      .set({
        status: 'submitted',
        solution_handle: fields.solutionHandle,
        time_spent_hours: fields.timeSpentHours,
        submitted_at: at,
        updated_at: at,
      })
      .where('id', '=', id)
      .where('status', '=', 'in_progress')
      .returningAll()
      .executeTakeFirst();
    return row ? taskFromRow(row) : undefined;
  }

  async insertPayment(p: Payment): Promise<void> {
    try {
      await this.db
        .insertInto('payments')
        .values({
          id: p.id,
          task_id: p.taskId,
          buyer_id: p.buyerId,
          amount_cents: p.amountCents,
          created_at: new Date(p.createdAt),
        })
        .execute();
    } catch (err) {
      if (isUniqueViolation(err)) throw invalidState('payment_already_recorded');
      throw err;
    }
  }

  async getPayment(id: string): Promise<Payment | undefined> {
    const row = await this.db.selectFrom('payments').selectAll().where('id', '=', id).executeTakeFirst();
    return row ? paymentFromRow(row) : undefined;
  }

  async getPaymentByTask(taskId: string): Promise<Payment | undefined> {
    const row = await this.db.selectFrom('payments').selectAll().where('task_id', '=', taskId).executeTakeFirst();
    return row ? paymentFromRow(row) : undefined;
  }

  async listPaymentsByBuyer(buyerId: string): Promise<Payment[]> {
    const rows = await this.db.selectFrom('payments').selectAll().where('buyer_id', '=', buyerId).orderBy('created_at', 'desc').execute();
    return rows.map(paymentFromRow);
  }

  async insertAuditEvent(evt: AuditEvent): Promise<void> {
    await this.db
      .insertInto('audit_log')
      .values({
        id: evt.id,
        actor_type: evt.actorType,
        actor_id: evt.actorId,
        action: evt.action,
        target_type: evt.targetType,
        target_id: evt.targetId,
        metadata: JSON.stringify(evt.metadata),
        created_at: new Date(evt.createdAt),
      })
      .execute();
  }

  async listAuditEvents(targetId: string): Promise<AuditEvent[]> {
    const rows = await this.db.selectFrom('audit_log').selectAll().where('target_id', '=', targetId).orderBy('created_at', 'asc').execute();
    return rows.map(auditFromRow);
  }

  async summarize(): Promise<WorkflowSummary> {
    const out = emptySummary();

    const projects = await this.db
      .selectFrom('projects')
      .select((eb) => ['status', eb.fn.countAll<string>().as('n')])
      .groupBy('status')
      .execute();
    for (const r of projects) out.projects[r.status] += Number(r.n);

    const proposals = await this.db
      .selectFrom('proposals')
      .select((eb) => ['status', eb.fn.countAll<string>().as('n')])
      .groupBy('status')
      .execute();
    for (const r of proposals) out.proposals[r.status] += Number(r.n);

    const tasks = await this.db
      .selectFrom('tasks')
      .select((eb) => ['status', eb.fn.countAll<string>().as('n'), sql<string | null>`sum(time_spent_hours)`.as('hours')])
      .groupBy('status')
      .execute();
    for (const r of tasks) {
      out.tasks[r.status] += Number(r.n);
      out.hoursLogged += Number(r.hours ?? 0);
    }

    const paid = await this.db
      .selectFrom('payments')
      .select((eb) => [eb.fn.countAll<string>().as('n'), sql<string>`coalesce(sum(amount_cents), 0)`.as('total')])
      .executeTakeFirstOrThrow();
    out.payments = Number(paid.n);
    out.paidCentsTotal = Number(paid.total);

    return out;
  }
}

/**
 * Postgres-backed store. Operations that guard an invariant lock the rows they read
 * (`SELECT … FOR UPDATE`) and change status with compare-and-set updates; the partial
 * unique indexes and the unique(task_id) on payments back them up.
 */
export class PgStore implements WorkflowStore {
  private readonly db: Kysely<DB>;

  constructor(pool: PostgresPool = createPool()) {
    this.db = new Kysely<DB>({ dialect: new PostgresDialect({ pool }) });
  }

  async transaction<T>(fn: (tx: WorkflowTx) => Promise<T>): Promise<T> {
    return await this.db.transaction().execute((trx) => fn(new PgTx(trx)));
  }

  /**
   * Applies each `*.sql` file in name order, one transaction per file. The filename is
   * claimed before its SQL runs: instances booting together queue on the claim, and every
   * one but the first finds the row already there and skips the file.
   */
  async migrate(migrationsDir = path.resolve(process.cwd(), 'db/migrations')): Promise<MigrationResult> {
    await sql`
      CREATE TABLE IF NOT EXISTS schema_migrations (
        filename TEXT PRIMARY KEY,
        applied_at TIMESTAMPTZ NOT NULL DEFAULT now()
      )
    `.execute(this.db);

    const files = (await readdir(migrationsDir)).filter((f) => f.endsWith('.sql')).sort();
    const res: MigrationResult = { applied: [], skipped: [] };
    for (const file of files) {
      const text = await readFile(path.join(migrationsDir, file), 'utf8');
      const ran = await this.db.transaction().execute(async (trx) => {
        const claimed = await sql`INSERT INTO schema_migrations(filename) VALUES (${file}) ON CONFLICT DO NOTHING`.execute(trx);
        if (!claimed.numAffectedRows) return false;
        await sql.raw(text).execute(trx);
        return true;
      });
      (ran ? res.applied : res.skipped).push(file);
    }
    return res;
  }

  async close(): Promise<void> {
    // Kysely's driver ends the pool.
    await this.db.destroy();
  }
}
