import { nanoid } from 'nanoid';
import { writeAuditEvent } from '../audit.js';
import { forbidden, invalidState, notFound } from '../errors.js';
import { inc } from '../metrics.js';
import type { WorkflowTx } from '../store.js';
import type { Principal, Project, Proposal, Task } from '../types.js';
import { assertCents, assertHours, now, requireRole, type WorkflowContext } from './context.js';
import { loadOwnedProject } from './projects.js';
import { assignLocked } from './tasks.js';

export interface SubmitProposalInput {
  projectId: string;
  coverLetter?: string;
  proposedHourlyRateCents: number;
  estimatedHours: number;
}

export interface Hire {
  proposal: Proposal;
  task: Task;
}

async function loadProposal(tx: WorkflowTx, proposalId: string): Promise<Proposal> {
  const proposal = await tx.getProposal(proposalId, { forUpdate: true });
  if (!proposal) throw notFound('proposal_not_found');
  return proposal;
}

/**
 * Loads a proposal and its project for an owner decision. Locks are taken project first,
 * then proposal, the same order as submit and assign: the project row lock is the single
 * point of mutual exclusion between decisions on the same project.
 */
async function loadForDecision(tx: WorkflowTx, principal: Principal, proposalId: string) {
  const unlocked = await tx.getProposal(proposalId);
  if (!unlocked) throw notFound('proposal_not_found');
  const project = await loadOwnedProject(tx, principal, unlocked.projectId, { forUpdate: true });
  const proposal = await loadProposal(tx, proposalId);
  return { proposal, project };
}

function decided(proposal: Proposal, status: Proposal['status'], ts: number): Proposal {
  return { ...proposal, status, decidedAt: ts };
}

export async function submitProposal(ctx: WorkflowContext, principal: Principal, input: SubmitProposalInput): Promise<Proposal> {
  requireRole(principal, 'developer');
  assertCents(input.proposedHourlyRateCents, 'invalid_hourly_rate');
  assertHours(input.estimatedHours, 'invalid_estimated_hours');

  const ts = now(ctx);
  const proposal = await ctx.store.transaction(async (tx) => {
    // Locked so a bid cannot land as Pending after a concurrent accept closed the project.
    const project = await tx.getProject(input.projectId, { forUpdate: true });
    if (!project) throw notFound('project_not_found');
    if (project.status !== 'open') throw invalidState('project_not_open');
    if (await tx.findActiveProposal(project.id, principal.id)) throw invalidState('proposal_already_submitted');

    const created: Proposal = {
      id: nanoid(12),
      projectId: project.id,
      developerId: principal.id,
      coverLetter: input.coverLetter ?? '',
      proposedHourlyRateCents: input.proposedHourlyRateCents,
      estimatedHours: input.estimatedHours,
      status: 'pending',
      createdAt: ts,
    };
    await tx.insertProposal(created);
    await writeAuditEvent(
      tx,
      principal,
      { action: 'proposal.submit', targetType: 'proposal', targetId: created.id, metadata: { projectId: project.id } },
      ts
    );
    return created;
  });
  inc('proposal_submitted_total');
  return proposal;
}

export async function withdrawProposal(ctx: WorkflowContext, principal: Principal, proposalId: string): Promise<Proposal> {
  const ts = now(ctx);
  return await ctx.store.transaction(async (tx) => {
    const proposal = await loadProposal(tx, proposalId);
    if (principal.role !== 'developer' || proposal.developerId !== principal.id) throw forbidden('not_proposal_author');
    if (!(await tx.setProposalStatus(proposal.id, 'pending', 'withdrawn', ts))) throw invalidState('proposal_not_pending');
    await writeAuditEvent(tx, principal, { action: 'proposal.withdraw', targetType: 'proposal', targetId: proposal.id }, ts);
    return decided(proposal, 'withdrawn', ts);
  });
}

/** Accept, reject the rest, close the project. Runs inside the caller's transaction. */
async function acceptLocked(
  tx: WorkflowTx,
  principal: Principal,
  proposal: Proposal,
  project: Project,
  ts: number
): Promise<Proposal> {
  if (project.status !== 'open') throw invalidState('project_not_open');
  const tasks = await tx.listTasksByProject(project.id);
  if (tasks.some((t) => t.developerId !== proposal.developerId)) throw invalidState('project_has_other_assignee');
  if (!(await tx.setProjectStatus(project.id, 'open', 'closed', ts))) throw invalidState('project_not_open');
  if (!(await tx.setProposalStatus(proposal.id, 'pending', 'accepted', ts))) throw invalidState('proposal_not_pending');
  const rejected = await tx.rejectPendingProposals(project.id, proposal.id, ts);
  await writeAuditEvent(
    tx,
    principal,
    {
      action: 'proposal.accept',
      targetType: 'proposal',
      targetId: proposal.id,
      metadata: { projectId: project.id, developerId: proposal.developerId, rejected },
    },
    ts
  );
  return decided(proposal, 'accepted', ts);
}

export async function acceptProposal(ctx: WorkflowContext, principal: Principal, proposalId: string): Promise<Proposal> {
  const ts = now(ctx);
  const accepted = await ctx.store.transaction(async (tx) => {
    const { proposal, project } = await loadForDecision(tx, principal, proposalId);
    return await acceptLocked(tx, principal, proposal, project, ts);
  });
  inc('proposal_accepted_total');
  return accepted;
}

export async function rejectProposal(ctx: WorkflowContext, principal: Principal, proposalId: string): Promise<Proposal> {
  const ts = now(ctx);
  return await ctx.store.transaction(async (tx) => {
    const { proposal } = await loadForDecision(tx, principal, proposalId);
    if (!(await tx.setProposalStatus(proposal.id, 'pending', 'rejected', ts))) throw invalidState('proposal_not_pending');
    await writeAuditEvent(tx, principal, { action: 'proposal.reject', targetType: 'proposal', targetId: proposal.id }, ts);
    return decided(proposal, 'rejected', ts);
  });
}

/**
 * Accepts the proposal and assigns its developer a task at the proposed rate, in one
 * transaction. The two-step accept then assign path stays available.
 */
export async function hireProposal(ctx: WorkflowContext, principal: Principal, proposalId: string): Promise<Hire> {
  const ts = now(ctx);
  const hire = await ctx.store.transaction(async (tx) => {
    const { proposal, project } = await loadForDecision(tx, principal, proposalId);
    const accepted = await acceptLocked(tx, principal, proposal, project, ts);
    const task = await assignLocked(
      tx,
      principal,
      project,
      { developerId: accepted.developerId, hourlyRateCents: accepted.proposedHourlyRateCents },
      ts
    );
    return { proposal: accepted, task };
  });
  inc('proposal_accepted_total');
  inc('task_assigned_total');
  return hire;
}

export async function listProposalsForProject(
  ctx: WorkflowContext,
  principal: Principal,
  projectId: string
): Promise<Proposal[]> {
  return await ctx.store.transaction(async (tx) => {
    if (principal.role !== 'admin') await loadOwnedProject(tx, principal, projectId);
    else if (!(await tx.getProject(projectId))) throw notFound('project_not_found');
    return await tx.listProposalsByProject(projectId);
  });
}

export async function listMyProposals(ctx: WorkflowContext, principal: Principal): Promise<Proposal[]> {
  requireRole(principal, 'developer');
  return await ctx.store.transaction((tx) => tx.listProposalsByDeveloper(principal.id));
}
