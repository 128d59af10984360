import { describe, it, expect, beforeEach } from 'vitest';
import { MemoryBlobStore } from '../src/storage.js';
import { sha256Bytes } from '../src/utils.js';
import { payTask } from '../src/workflow/payments.js';
import {
  NEXT_STATUS,
  advanceTask,
  assignTask,
  getTask,
  listMyTasks,
  listTasksForProject,
  submitSolution,
} from '../src/workflow/tasks.js';
import {
  FailingBlobStore,
  admin,
  buyer,
  devA,
  devB,
  failure,
  inProgressTask,
  newContext,
  openProject,
  otherBuyer,
  zipBytes,
  type TestContext,
} from './helpers.js';

describe('task lifecycle', () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = newContext();
  });

  it('moves forward one step at a time', () => {
    expect(NEXT_STATUS).toEqual({ assigned: 'in_progress', in_progress: 'submitted', submitted: 'paid', paid: undefined });
  });

  it('assigns on an owned project with the buyer derived from the project', async () => {
    const project = await openProject(ctx);
    const task = await assignTask(ctx, buyer, {
      projectId: project.id,
      developerId: devA.id,
      hourlyRateCents: 5000,
      title: '  Hero section ',
    });
    expect(task).toMatchObject({ buyerId: buyer.id, developerId: devA.id, status: 'assigned', title: 'Hero section' });
    expect(task.solutionHandle).toBeUndefined();
    expect(task.timeSpentHours).toBeUndefined();

    expect(await failure(assignTask(ctx, otherBuyer, { projectId: project.id, developerId: devA.id, hourlyRateCents: 5000 }))).toEqual({
      kind: 'forbidden',
      reason: 'not_project_owner',
    });
    expect(await failure(assignTask(ctx, buyer, { projectId: project.id, developerId: devA.id, hourlyRateCents: -1 }))).toEqual({
      kind: 'invalid_input',
      reason: 'invalid_hourly_rate',
    });
  });

  it('only the task developer advances, and never into submitted or paid', async () => {
    const project = await openProject(ctx);
    const task = await assignTask(ctx, buyer, { projectId: project.id, developerId: devA.id, hourlyRateCents: 5000 });

    expect(await failure(advanceTask(ctx, devB, task.id, 'in_progress'))).toEqual({ kind: 'forbidden', reason: 'not_task_developer' });
    expect(await failure(advanceTask(ctx, buyer, task.id, 'in_progress'))).toEqual({ kind: 'forbidden', reason: 'not_task_developer' });
    expect(await failure(advanceTask(ctx, devA, task.id, 'submitted'))).toEqual({
      kind: 'invalid_state',
      reason: 'status_requires_dedicated_operation',
    });
    expect(await failure(advanceTask(ctx, devA, task.id, 'paid'))).toEqual({
      kind: 'invalid_state',
      reason: 'status_requires_dedicated_operation',
    });
    expect(await failure(advanceTask(ctx, devA, task.id, 'assigned'))).toEqual({ kind: 'invalid_state', reason: 'illegal_transition' });

    const started = await advanceTask(ctx, devA, task.id, 'in_progress');
    expect(started.status).toBe('in_progress');
    expect(await failure(advanceTask(ctx, devA, task.id, 'assigned'))).toEqual({ kind: 'invalid_state', reason: 'illegal_transition' });
    expect(await failure(advanceTask(ctx, devA, 'missing', 'in_progress'))).toEqual({ kind: 'not_found', reason: 'task_not_found' });
  });

  it('submit stores the archive and records handle and time together', async () => {
    const task = await inProgressTask(ctx);
    const bytes = zipBytes('v1');

    const submitted = await submitSolution(ctx, devA, task.id, bytes, 8.5);
    expect(submitted.status).toBe('submitted');
    expect(submitted.solutionHandle).toBe(sha256Bytes(bytes));
    expect(submitted.timeSpentHours).toBe(8.5);
    expect(submitted.submittedAt).toBeDefined();
    expect(await ctx.blobs.get(sha256Bytes(bytes))).toEqual(bytes);
  });

  it('submit requires in_progress and the task developer', async () => {
    const project = await openProject(ctx);
    const task = await assignTask(ctx, buyer, { projectId: project.id, developerId: devA.id, hourlyRateCents: 5000 });
    expect(await failure(submitSolution(ctx, devA, task.id, zipBytes(), 2))).toEqual({ kind: 'invalid_state', reason: 'task_not_in_progress' });

    await advanceTask(ctx, devA, task.id, 'in_progress');
    expect(await failure(submitSolution(ctx, devB, task.id, zipBytes(), 2))).toEqual({ kind: 'forbidden', reason: 'not_task_developer' });

    await submitSolution(ctx, devA, task.id, zipBytes(), 2);
    expect(await failure(submitSolution(ctx, devA, task.id, zipBytes('again'), 3))).toEqual({
      kind: 'invalid_state',
      reason: 'task_not_in_progress',
    });

    await payTask(ctx, buyer, task.id);
    expect(await failure(submitSolution(ctx, devA, task.id, zipBytes('late'), 1))).toEqual({
      kind: 'invalid_state',
      reason: 'task_not_in_progress',
    });
  });

  it('validates time spent and the archive before touching storage', async () => {
    const blobs = new MemoryBlobStore();
    ctx = newContext(blobs);
    const task = await inProgressTask(ctx);

    for (const hours of [0, -2, Number.NaN, Number.POSITIVE_INFINITY]) {
      expect(await failure(submitSolution(ctx, devA, task.id, zipBytes(), hours))).toEqual({
        kind: 'invalid_input',
        reason: 'invalid_time_spent',
      });
    }
    expect(await failure(submitSolution(ctx, devA, task.id, new Uint8Array(), 1))).toEqual({
      kind: 'invalid_input',
      reason: 'empty_solution',
    });
    expect(await failure(submitSolution(ctx, devB, task.id, new Uint8Array(), 0))).toEqual({
      kind: 'forbidden',
      reason: 'not_task_developer',
    });
    expect(blobs.size).toBe(0);
  });

  it('a failed storage write leaves the task in_progress and retryable', async () => {
    const failing = newContext(new FailingBlobStore());
    const task = await inProgressTask(failing);

    await expect(submitSolution(failing, devA, task.id, zipBytes(), 4)).rejects.toThrow('storage unavailable');
    const after = await getTask(failing, devA, task.id);
    expect(after.status).toBe('in_progress');
    expect(after.solutionHandle).toBeUndefined();
    expect(after.timeSpentHours).toBeUndefined();

    const retry = { ...failing, blobs: new MemoryBlobStore() };
    expect((await submitSolution(retry, devA, task.id, zipBytes(), 4)).status).toBe('submitted');
  });

  it('records every transition in the audit log', async () => {
    const task = await inProgressTask(ctx);
    await submitSolution(ctx, devA, task.id, zipBytes(), 1.25);

    const events = await ctx.store.transaction((tx) => tx.listAuditEvents(task.id));
    expect(events.map((e) => e.action)).toEqual(['task.assign', 'task.advance', 'task.submit']);
    expect(events[1].metadata).toEqual({ from: 'assigned', to: 'in_progress' });
    expect(events[2].actorId).toBe(devA.id);
  });

  it('shows tasks to their parties only', async () => {
    const task = await inProgressTask(ctx);

    expect((await getTask(ctx, buyer, task.id)).id).toBe(task.id);
    expect((await getTask(ctx, devA, task.id)).id).toBe(task.id);
    expect((await getTask(ctx, admin, task.id)).id).toBe(task.id);
    expect(await failure(getTask(ctx, otherBuyer, task.id))).toEqual({ kind: 'forbidden', reason: 'task_not_visible' });
    expect(await failure(getTask(ctx, devB, task.id))).toEqual({ kind: 'forbidden', reason: 'task_not_visible' });

    expect((await listMyTasks(ctx, devA)).map((t) => t.id)).toEqual([task.id]);
    expect((await listMyTasks(ctx, buyer)).map((t) => t.id)).toEqual([task.id]);
    expect(await listMyTasks(ctx, devB)).toEqual([]);
    expect((await listTasksForProject(ctx, admin, task.projectId)).map((t) => t.id)).toEqual([task.id]);
    expect(await failure(listTasksForProject(ctx, devA, task.projectId))).toEqual({ kind: 'forbidden', reason: 'not_project_owner' });
  });
});
