import { nanoid } from 'nanoid';
import { writeAuditEvent } from '../audit.js';
import { forbidden, invalidState, notFound } from '../errors.js';
import type { ProjectPatch, WorkflowTx } from '../store.js';
import type { Principal, Project } from '../types.js';
import { assertCents, assertHours, assertText, now, requireRole, type WorkflowContext } from './context.js';

export interface CreateProjectInput {
  title: string;
  description?: string;
  expectedHourlyRateCents: number;
  expectedDurationHours: number;
  tags?: string[];
}

function normalizeTags(tags: string[] | undefined): string[] {
  const out = new Set<string>();
  for (const t of tags ?? []) {
    const tag = t.trim().toLowerCase();
    if (tag) out.add(tag);
  }
  return [...out];
}

function validatePatch(patch: ProjectPatch) {
  if (patch.title !== undefined) assertText(patch.title, 'invalid_title');
  if (patch.expectedHourlyRateCents !== undefined) assertCents(patch.expectedHourlyRateCents, 'invalid_hourly_rate');
  if (patch.expectedDurationHours !== undefined) assertHours(patch.expectedDurationHours, 'invalid_duration');
}

/** Loads the project and checks the caller owns it; takes a row lock when asked. */
export async function loadOwnedProject(
  tx: WorkflowTx,
  principal: Principal,
  projectId: string,
  opts: { forUpdate?: boolean } = {}
): Promise<Project> {
  const project = await tx.getProject(projectId, opts);
  if (!project) throw notFound('project_not_found');
  if (principal.role !== 'buyer' || project.ownerId !== principal.id) throw forbidden('not_project_owner');
  return project;
}

export async function createProject(ctx: WorkflowContext, principal: Principal, input: CreateProjectInput): Promise<Project> {
  requireRole(principal, 'buyer');
  validatePatch(input);
  assertText(input.title, 'invalid_title');

  const ts = now(ctx);
  const project: Project = {
    id: nanoid(12),
    ownerId: principal.id,
    title: input.title.trim(),
    description: input.description ?? '',
    expectedHourlyRateCents: input.expectedHourlyRateCents,
    expectedDurationHours: input.expectedDurationHours,
    tags: normalizeTags(input.tags),
    status: 'open',
    createdAt: ts,
    updatedAt: ts,
  };

  return await ctx.store.transaction(async (tx) => {
    await tx.insertProject(project);
    await writeAuditEvent(tx, principal, { action: 'project.create', targetType: 'project', targetId: project.id }, ts);
    return project;
  });
}

export async function getProject(ctx: WorkflowContext, _principal: Principal, projectId: string): Promise<Project> {
  const project = await ctx.store.transaction((tx) => tx.getProject(projectId));
  if (!project) throw notFound('project_not_found');
  return project;
}

export async function updateProject(
  ctx: WorkflowContext,
  principal: Principal,
  projectId: string,
  patch: ProjectPatch
): Promise<Project> {
  validatePatch(patch);
  const clean: ProjectPatch = {};
  if (patch.title !== undefined) clean.title = patch.title.trim();
  if (patch.description !== undefined) clean.description = patch.description;
  if (patch.expectedHourlyRateCents !== undefined) clean.expectedHourlyRateCents = patch.expectedHourlyRateCents;
  if (patch.expectedDurationHours !== undefined) clean.expectedDurationHours = patch.expectedDurationHours;
  if (patch.tags !== undefined) clean.tags = normalizeTags(patch.tags);

  const ts = now(ctx);
  return await ctx.store.transaction(async (tx) => {
    const project = await loadOwnedProject(tx, principal, projectId, { forUpdate: true });
    // Bids were made against the posted terms; they freeze once the project closes.
    if (project.status !== 'open') throw invalidState('project_not_open');
    const updated = await tx.updateProject(project.id, clean, ts);
    if (!updated) throw notFound('project_not_found');
    await writeAuditEvent(
      tx,
      principal,
      { action: 'project.update', targetType: 'project', targetId: project.id, metadata: { fields: Object.keys(clean) } },
      ts
    );
    return updated;
  });
}

/** Manual close: the project stops taking bids and pending proposals can no longer be accepted. */
export async function closeProject(ctx: WorkflowContext, principal: Principal, projectId: string): Promise<Project> {
  const ts = now(ctx);
  return await ctx.store.transaction(async (tx) => {
    const project = await loadOwnedProject(tx, principal, projectId, { forUpdate: true });
    if (!(await tx.setProjectStatus(project.id, 'open', 'closed', ts))) throw invalidState('project_not_open');
    await writeAuditEvent(tx, principal, { action: 'project.close', targetType: 'project', targetId: project.id }, ts);
    const closed: Project = { ...project, status: 'closed', updatedAt: ts };
    return closed;
  });
}

export async function listMyProjects(ctx: WorkflowContext, principal: Principal): Promise<Project[]> {
  requireRole(principal, 'buyer');
  return await ctx.store.transaction((tx) => tx.listProjectsByOwner(principal.id));
}
