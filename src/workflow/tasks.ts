import { nanoid } from 'nanoid';
import { writeAuditEvent } from '../audit.js';
import { forbidden, invalidInput, invalidState, isWorkflowError, notFound } from '../errors.js';
import { inc } from '../metrics.js';
import { maxUploadBytes } from '../storage.js';
import type { WorkflowTx } from '../store.js';
import type { Principal, Project, Task, TaskStatus } from '../types.js';
import { assertCents, assertHours, now, requireRole, type WorkflowContext } from './context.js';
import { authorizeRelease } from './payments.js';
import { loadOwnedProject } from './projects.js';

/** Forward-only lifecycle; `undefined` marks the terminal state. */
export const NEXT_STATUS: Record<TaskStatus, TaskStatus | undefined> = {
  assigned: 'in_progress',
  in_progress: 'submitted',
  submitted: 'paid',
  paid: undefined,
};

// Reached only through submitSolution and payTask.
const DEDICATED_STATUSES: ReadonlySet<TaskStatus> = new Set(['submitted', 'paid']);

export interface AssignTaskInput {
  projectId: string;
  developerId: string;
  hourlyRateCents: number;
  title?: string;
  description?: string;
}

export interface SolutionDownload {
  taskId: string;
  paymentId: string;
  bytes: Uint8Array;
}

function requireTaskDeveloper(principal: Principal, task: Task) {
  if (principal.role !== 'developer' || task.developerId !== principal.id) throw forbidden('not_task_developer');
}

async function loadTask(tx: WorkflowTx, taskId: string, opts: { forUpdate?: boolean } = {}): Promise<Task> {
  const task = await tx.getTask(taskId, opts);
  if (!task) throw notFound('task_not_found');
  return task;
}

/**
 * Creates an assigned task on a project the caller owns and has locked. When the project
 * has a hire, only the hired developer may be assigned.
 */
export async function assignLocked(
  tx: WorkflowTx,
  principal: Principal,
  project: Project,
  input: Omit<AssignTaskInput, 'projectId'>,
  ts: number
): Promise<Task> {
  assertCents(input.hourlyRateCents, 'invalid_hourly_rate');
  if (!input.developerId.trim()) throw invalidInput('invalid_developer');

  const hire = await tx.findAcceptedProposal(project.id);
  if (hire && hire.developerId !== input.developerId) throw invalidState('developer_not_hired');

  const task: Task = {
    id: nanoid(12),
    projectId: project.id,
    developerId: input.developerId,
    buyerId: project.ownerId,
    title: input.title?.trim() || project.title,
    description: input.description ?? project.description,
    hourlyRateCents: input.hourlyRateCents,
    status: 'assigned',
    createdAt: ts,
    updatedAt: ts,
  };
  await tx.insertTask(task);
  await writeAuditEvent(
    tx,
    principal,
    {
      action: 'task.assign',
      targetType: 'task',
      targetId: task.id,
      metadata: { projectId: project.id, developerId: task.developerId, hourlyRateCents: task.hourlyRateCents },
    },
    ts
  );
  return task;
}

export async function assignTask(ctx: WorkflowContext, principal: Principal, input: AssignTaskInput): Promise<Task> {
  const ts = now(ctx);
  const task = await ctx.store.transaction(async (tx) => {
    // Lock the project so a concurrent accept cannot hire someone else mid-assignment.
    const project = await loadOwnedProject(tx, principal, input.projectId, { forUpdate: true });
    return await assignLocked(tx, principal, project, input, ts);
  });
  inc('task_assigned_total');
  return task;
}

export async function advanceTask(
  ctx: WorkflowContext,
  principal: Principal,
  taskId: string,
  newStatus: TaskStatus
): Promise<Task> {
  const ts = now(ctx);
  return await ctx.store.transaction(async (tx) => {
    const task = await loadTask(tx, taskId, { forUpdate: true });
    requireTaskDeveloper(principal, task);
    if (DEDICATED_STATUSES.has(newStatus)) throw invalidState('status_requires_dedicated_operation');
    if (NEXT_STATUS[task.status] !== newStatus) throw invalidState('illegal_transition');

    const updated = await tx.setTaskStatus(task.id, task.status, newStatus, ts);
    if (!updated) throw invalidState('task_status_changed');
    await writeAuditEvent(
      tx,
      principal,
      { action: 'task.advance', targetType: 'task', targetId: task.id, metadata: { from: task.status, to: newStatus } },
      ts
    );
    return updated;
  });
}

/**
 * Stores the archive, then flips the task to submitted. The blob write happens outside
 * any transaction: if it fails the task stays in_progress, and if the process dies after
 * it the orphaned blob is harmless because the handle was never recorded.
 */
export async function submitSolution(
  ctx: WorkflowContext,
  principal: Principal,
  taskId: string,
  bytes: Uint8Array,
  timeSpentHours: number
): Promise<Task> {
  const before = await ctx.store.transaction((tx) => loadTask(tx, taskId));
  requireTaskDeveloper(principal, before);
  assertHours(timeSpentHours, 'invalid_time_spent');
  if (bytes.byteLength === 0) throw invalidInput('empty_solution');
  if (bytes.byteLength > maxUploadBytes()) throw invalidInput('solution_too_large');
  if (before.status !== 'in_progress') throw invalidState('task_not_in_progress');

  const handle = await ctx.blobs.put(bytes);

  const ts = now(ctx);
  const task = await ctx.store.transaction(async (tx) => {
    const current = await loadTask(tx, taskId, { forUpdate: true });
    requireTaskDeveloper(principal, current);
    const updated = await tx.recordSubmission(current.id, { solutionHandle: handle, timeSpentHours, submittedAt: ts });
    if (!updated) throw invalidState('task_not_in_progress');
    await writeAuditEvent(
      tx,
      principal,
      { action: 'task.submit', targetType: 'task', targetId: current.id, metadata: { timeSpentHours, sizeBytes: bytes.byteLength } },
      ts
    );
    return updated;
  });
  inc('task_submitted_total');
  return task;
}

/**
 * The only path that returns solution bytes; it goes through the release gate. The
 * release is logged once the bytes have been read.
 */
export async function getDownload(ctx: WorkflowContext, principal: Principal, taskId: string): Promise<SolutionDownload> {
  const grant = await ctx.store
    .transaction(async (tx) => {
      const task = await loadTask(tx, taskId);
      if (principal.role !== 'buyer' || task.buyerId !== principal.id) throw forbidden('not_task_buyer');
      return await authorizeRelease(tx, principal, task.id);
    })
    .catch((err: unknown) => {
      if (isWorkflowError(err) && err.kind === 'payment_required') inc('release_denied_total');
      throw err;
    });

  const bytes = await ctx.blobs.get(grant.handle);

  const ts = now(ctx);
  await ctx.store.transaction((tx) =>
    writeAuditEvent(
      tx,
      principal,
      { action: 'solution.release', targetType: 'task', targetId: grant.taskId, metadata: { paymentId: grant.paymentId } },
      ts
    )
  );
  inc('release_granted_total');
  return { taskId: grant.taskId, paymentId: grant.paymentId, bytes };
}

/** Visible to the task's buyer, its developer, and admins. */
export async function getTask(ctx: WorkflowContext, principal: Principal, taskId: string): Promise<Task> {
  const task = await ctx.store.transaction((tx) => loadTask(tx, taskId));
  const allowed = principal.role === 'admin' || task.buyerId === principal.id || task.developerId === principal.id;
  if (!allowed) throw forbidden('task_not_visible');
  return task;
}

export async function listTasksForProject(ctx: WorkflowContext, principal: Principal, projectId: string): Promise<Task[]> {
  return await ctx.store.transaction(async (tx) => {
    if (principal.role !== 'admin') await loadOwnedProject(tx, principal, projectId);
    else if (!(await tx.getProject(projectId))) throw notFound('project_not_found');
    return await tx.listTasksByProject(projectId);
  });
}

export async function listMyTasks(ctx: WorkflowContext, principal: Principal): Promise<Task[]> {
  requireRole(principal, 'buyer', 'developer');
  return await ctx.store.transaction((tx) =>
    principal.role === 'developer' ? tx.listTasksByDeveloper(principal.id) : tx.listTasksByBuyer(principal.id)
  );
}
