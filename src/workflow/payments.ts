import { nanoid } from 'nanoid';
import { writeAuditEvent } from '../audit.js';
import { forbidden, invalidInput, invalidState, notFound, paymentRequired } from '../errors.js';
import { inc } from '../metrics.js';
import type { WorkflowTx } from '../store.js';
import type { Payment, Principal, Task } from '../types.js';
import { amountForHours } from '../utils.js';
import { now, requireRole, type WorkflowContext } from './context.js';

export interface PaymentReceipt {
  payment: Payment;
  task: Task;
}

export interface ReleaseGrant {
  taskId: string;
  paymentId: string;
  handle: string;
}

/**
 * Records the payment for a submitted task and marks it paid in one transaction. The
 * task row lock serializes concurrent calls: the first wins, later ones see `paid` and
 * fail with invalid_state. unique(task_id) on the ledger catches anything that slips by.
 */
export async function payTask(ctx: WorkflowContext, principal: Principal, taskId: string): Promise<PaymentReceipt> {
  const ts = now(ctx);
  const receipt = await ctx.store.transaction(async (tx) => {
    const task = await tx.getTask(taskId, { forUpdate: true });
    if (!task) throw notFound('task_not_found');
    if (principal.role !== 'buyer' || task.buyerId !== principal.id) throw forbidden('not_task_buyer');
    if (task.status === 'paid') throw invalidState('task_already_paid');
    if (task.status !== 'submitted') throw invalidState('task_not_submitted');
    if (task.timeSpentHours === undefined) throw new Error(`submitted task ${task.id} has no time spent`);

    const amountCents = amountForHours(task.hourlyRateCents, task.timeSpentHours);
    if (!Number.isSafeInteger(amountCents)) throw invalidInput('amount_out_of_range');

    const payment: Payment = {
      id: nanoid(12),
      taskId: task.id,
      buyerId: task.buyerId,
      amountCents,
      createdAt: ts,
    };
    await tx.insertPayment(payment);

    const paid = await tx.setTaskStatus(task.id, 'submitted', 'paid', ts);
    if (!paid) throw invalidState('task_not_submitted');

    await writeAuditEvent(
      tx,
      principal,
      { action: 'payment.create', targetType: 'payment', targetId: payment.id, metadata: { taskId: task.id, amountCents: payment.amountCents } },
      ts
    );
    return { payment, task: paid };
  });

  inc('payment_recorded_total');
  inc('payment_cents_total', receipt.payment.amountCents);
  return receipt;
}

/**
 * Release gate: grants access to a task's solution iff a payment exists for the task and
 * the caller is the task's buyer. Anything else is payment_required.
 */
export async function authorizeRelease(tx: WorkflowTx, principal: Principal, taskId: string): Promise<ReleaseGrant> {
  const task = await tx.getTask(taskId);
  if (!task) throw notFound('task_not_found');
  const payment = await tx.getPaymentByTask(task.id);
  if (!payment || principal.id !== task.buyerId) throw paymentRequired();
  if (!task.solutionHandle) throw new Error(`paid task ${task.id} has no solution handle`);
  return { taskId: task.id, paymentId: payment.id, handle: task.solutionHandle };
}

/** Visible to the paying buyer, the developer of the paid task, and admins. */
export async function getPayment(ctx: WorkflowContext, principal: Principal, paymentId: string): Promise<Payment> {
  return await ctx.store.transaction(async (tx) => {
    const payment = await tx.getPayment(paymentId);
    if (!payment) throw notFound('payment_not_found');
    if (principal.role === 'admin') return payment;
    if (principal.role === 'buyer' && payment.buyerId === principal.id) return payment;
    if (principal.role === 'developer') {
      const task = await tx.getTask(payment.taskId);
      if (task && task.developerId === principal.id) return payment;
    }
    throw forbidden('payment_not_visible');
  });
}

export async function listMyPayments(ctx: WorkflowContext, principal: Principal): Promise<Payment[]> {
  requireRole(principal, 'buyer');
  return await ctx.store.transaction((tx) => tx.listPaymentsByBuyer(principal.id));
}
