import { describe, it, expect, beforeEach } from 'vitest';
import { isWorkflowError } from '../src/errors.js';
import { counterValue, resetCounters } from '../src/metrics.js';
import { amountForHours } from '../src/utils.js';
import { authorizeRelease, getPayment, listMyPayments, payTask } from '../src/workflow/payments.js';
import { MAX_HOURS, MAX_RATE_CENTS } from '../src/workflow/context.js';
import { assignTask, getDownload, getTask, submitSolution } from '../src/workflow/tasks.js';
import {
  admin,
  buyer,
  devA,
  devB,
  FailingBlobStore,
  failure,
  inProgressTask,
  newContext,
  openProject,
  otherBuyer,
  submittedTask,
  zipBytes,
  type TestContext,
} from './helpers.js';

describe('payment ledger and release gate', () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = newContext();
    resetCounters();
  });

  it('pays hourly rate times time spent and releases the archive to the buyer', async () => {
    const task = await inProgressTask(ctx, 5000);
    const bytes = zipBytes('final');
    const submitted = await submitSolution(ctx, devA, task.id, bytes, 8.5);
    expect(submitted.status).toBe('submitted');

    const { payment, task: paid } = await payTask(ctx, buyer, task.id);
    expect(payment).toMatchObject({ taskId: task.id, buyerId: buyer.id, amountCents: 42500 });
    expect(paid.status).toBe('paid');
    expect(paid.solutionHandle).toBe(submitted.solutionHandle);

    const download = await getDownload(ctx, buyer, task.id);
    expect(download.bytes).toEqual(bytes);
    expect(download.paymentId).toBe(payment.id);

    expect(await failure(getDownload(ctx, otherBuyer, task.id))).toEqual({ kind: 'forbidden', reason: 'not_task_buyer' });
    expect(counterValue('payment_cents_total')).toBe(42500);
    expect(counterValue('release_granted_total')).toBe(1);
  });

  it('rounds fractional cents half up', () => {
    expect(amountForHours(3333, 1.5)).toBe(5000);
    expect(amountForHours(5000, 8.5)).toBe(42500);
    expect(amountForHours(1999, 0.25)).toBe(500);
  });

  it('bounds rates and hours so every amount stays a safe integer', async () => {
    const project = await openProject(ctx);
    expect(
      await failure(assignTask(ctx, buyer, { projectId: project.id, developerId: devA.id, hourlyRateCents: MAX_RATE_CENTS + 1 }))
    ).toEqual({ kind: 'invalid_input', reason: 'invalid_hourly_rate' });

    const task = await inProgressTask(ctx, MAX_RATE_CENTS);
    expect(await failure(submitSolution(ctx, devA, task.id, zipBytes(), MAX_HOURS + 1))).toEqual({
      kind: 'invalid_input',
      reason: 'invalid_time_spent',
    });
    await submitSolution(ctx, devA, task.id, zipBytes(), MAX_HOURS);
    const { payment } = await payTask(ctx, buyer, task.id);
    expect(payment.amountCents).toBe(10_000_000_000_000);
  });

  it('refuses a payment whose amount is not a safe integer and leaves the task submitted', async () => {
    const project = await openProject(ctx);
    await ctx.store.transaction((tx) =>
      tx.insertTask({
        id: 'task-huge',
        projectId: project.id,
        developerId: devA.id,
        buyerId: buyer.id,
        title: 'Legacy row',
        description: '',
        hourlyRateCents: Number.MAX_SAFE_INTEGER,
        status: 'submitted',
        solutionHandle: 'f'.repeat(64),
        timeSpentHours: 2,
        submittedAt: 1_700_000_000_000,
        createdAt: 1_700_000_000_000,
        updatedAt: 1_700_000_000_000,
      })
    );

    expect(await failure(payTask(ctx, buyer, 'task-huge'))).toEqual({ kind: 'invalid_input', reason: 'amount_out_of_range' });
    expect((await getTask(ctx, buyer, 'task-huge')).status).toBe('submitted');
    expect(await listMyPayments(ctx, buyer)).toEqual([]);
  });

  it('logs a release only after the archive was read', async () => {
    const task = await submittedTask(ctx);
    await payTask(ctx, buyer, task.id);
    const releases = async () =>
      (await ctx.store.transaction((tx) => tx.listAuditEvents(task.id))).filter((e) => e.action === 'solution.release');

    await expect(getDownload({ ...ctx, blobs: new FailingBlobStore() }, buyer, task.id)).rejects.toThrow('storage unavailable');
    expect(await releases()).toEqual([]);
    expect(counterValue('release_granted_total')).toBe(0);

    const download = await getDownload(ctx, buyer, task.id);
    const logged = await releases();
    expect(logged).toHaveLength(1);
    expect(logged[0].metadata).toEqual({ paymentId: download.paymentId });
  });

  it('refuses to pay a task that has not been submitted', async () => {
    const task = await inProgressTask(ctx);
    expect(await failure(payTask(ctx, buyer, task.id))).toEqual({ kind: 'invalid_state', reason: 'task_not_submitted' });
    expect(await listMyPayments(ctx, buyer)).toEqual([]);
    expect((await getTask(ctx, buyer, task.id)).status).toBe('in_progress');
  });

  it('only the task buyer pays', async () => {
    const task = await submittedTask(ctx);
    expect(await failure(payTask(ctx, otherBuyer, task.id))).toEqual({ kind: 'forbidden', reason: 'not_task_buyer' });
    expect(await failure(payTask(ctx, devA, task.id))).toEqual({ kind: 'forbidden', reason: 'not_task_buyer' });
    expect(await failure(payTask(ctx, buyer, 'missing'))).toEqual({ kind: 'not_found', reason: 'task_not_found' });
  });

  it('records at most one payment per task', async () => {
    const task = await submittedTask(ctx);
    await payTask(ctx, buyer, task.id);
    expect(await failure(payTask(ctx, buyer, task.id))).toEqual({ kind: 'invalid_state', reason: 'task_already_paid' });
    expect(await listMyPayments(ctx, buyer)).toHaveLength(1);
  });

  it('two concurrent pays produce one payment and one invalid_state', async () => {
    const task = await submittedTask(ctx);

    const results = await Promise.allSettled([payTask(ctx, buyer, task.id), payTask(ctx, buyer, task.id)]);
    const fulfilled = results.filter((r) => r.status === 'fulfilled');
    const rejected = results.filter((r): r is PromiseRejectedResult => r.status === 'rejected');
    expect(fulfilled).toHaveLength(1);
    expect(rejected).toHaveLength(1);
    const reason: unknown = rejected[0].reason;
    expect(isWorkflowError(reason) ? reason.kind : reason).toBe('invalid_state');

    const payments = await listMyPayments(ctx, buyer);
    expect(payments.map((p) => p.taskId)).toEqual([task.id]);
    expect(counterValue('payment_recorded_total')).toBe(1);
  });

  it('returns payment_required until a payment exists', async () => {
    const task = await submittedTask(ctx);
    expect(await failure(getDownload(ctx, buyer, task.id))).toEqual({ kind: 'payment_required', reason: 'payment_required' });
    expect(counterValue('release_denied_total')).toBe(1);
    expect(counterValue('release_granted_total')).toBe(0);

    const before = await inProgressTask(ctx);
    expect(await failure(getDownload(ctx, buyer, before.id))).toEqual({ kind: 'payment_required', reason: 'payment_required' });
  });

  it('keeps the developer and strangers away from the download', async () => {
    const task = await submittedTask(ctx);
    await payTask(ctx, buyer, task.id);
    expect(await failure(getDownload(ctx, devA, task.id))).toEqual({ kind: 'forbidden', reason: 'not_task_buyer' });
    expect(await failure(getDownload(ctx, admin, task.id))).toEqual({ kind: 'forbidden', reason: 'not_task_buyer' });
  });

  it('the gate itself grants only the paying buyer', async () => {
    const task = await submittedTask(ctx);
    const { payment } = await payTask(ctx, buyer, task.id);

    const grant = await ctx.store.transaction((tx) => authorizeRelease(tx, buyer, task.id));
    expect(grant).toEqual({ taskId: task.id, paymentId: payment.id, handle: task.solutionHandle });
    expect(await failure(ctx.store.transaction((tx) => authorizeRelease(tx, otherBuyer, task.id)))).toEqual({
      kind: 'payment_required',
      reason: 'payment_required',
    });
  });

  it('shows a payment to its buyer, the paid developer, and admins', async () => {
    const task = await submittedTask(ctx);
    const { payment } = await payTask(ctx, buyer, task.id);

    expect((await getPayment(ctx, buyer, payment.id)).amountCents).toBe(42500);
    expect((await getPayment(ctx, devA, payment.id)).id).toBe(payment.id);
    expect((await getPayment(ctx, admin, payment.id)).id).toBe(payment.id);
    expect(await failure(getPayment(ctx, otherBuyer, payment.id))).toEqual({ kind: 'forbidden', reason: 'payment_not_visible' });
    expect(await failure(getPayment(ctx, devB, payment.id))).toEqual({ kind: 'forbidden', reason: 'payment_not_visible' });
    expect(await failure(getPayment(ctx, buyer, 'missing'))).toEqual({ kind: 'not_found', reason: 'payment_not_found' });
    expect(await failure(listMyPayments(ctx, devA))).toEqual({ kind: 'forbidden', reason: 'role_not_allowed' });
  });

  it('keeps payment and paid status in lockstep', async () => {
    const unpaid = await submittedTask(ctx);
    const paid = await submittedTask(ctx);
    await payTask(ctx, buyer, paid.id);

    await ctx.store.transaction(async (tx) => {
      for (const id of [unpaid.id, paid.id]) {
        const task = await tx.getTask(id);
        const payment = await tx.getPaymentByTask(id);
        expect(task?.status === 'paid').toBe(payment !== undefined);
        expect(task?.solutionHandle !== undefined).toBe(true);
      }
    });
  });
});
