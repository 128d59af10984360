import { isWorkflowError } from '../src/errors.js';
import { MemoryStore } from '../src/memoryStore.js';
import { type BlobStore, MemoryBlobStore } from '../src/storage.js';
import type { Principal, Project, Task } from '../src/types.js';
import type { WorkflowContext } from '../src/workflow/context.js';
import { createProject } from '../src/workflow/projects.js';
import { advanceTask, assignTask, submitSolution } from '../src/workflow/tasks.js';

export const buyer: Principal = { id: 'buyer-1', role: 'buyer' };
export const otherBuyer: Principal = { id: 'buyer-9', role: 'buyer' };
export const devA: Principal = { id: 'dev-2', role: 'developer' };
export const devB: Principal = { id: 'dev-3', role: 'developer' };
export const admin: Principal = { id: 'admin-1', role: 'admin' };

export type TestContext = WorkflowContext & { store: MemoryStore };

/** Fresh in-memory world; the clock advances one second per read. */
export function newContext(blobs: BlobStore = new MemoryBlobStore()): TestContext {
  let t = 1_700_000_000_000;
  return { store: new MemoryStore(), blobs, clock: () => (t += 1000) };
}

export class FailingBlobStore implements BlobStore {
  async put(): Promise<string> {
    throw new Error('storage unavailable');
  }

  async get(): Promise<Uint8Array> {
    throw new Error('storage unavailable');
  }
}

export function zipBytes(text = 'solution'): Uint8Array {
  return new Uint8Array(Buffer.from(`PK\u0003\u0004${text}`, 'utf8'));
}

/** Resolves to the workflow error a promise rejects with; anything else fails the test. */
export async function failure(p: Promise<unknown>): Promise<{ kind: string; reason: string }> {
  try {
    await p;
  } catch (err) {
    if (isWorkflowError(err)) return { kind: err.kind, reason: err.message };
    throw err;
  }
  throw new Error('expected the operation to fail');
}

export async function openProject(ctx: WorkflowContext, owner: Principal = buyer): Promise<Project> {
  return await createProject(ctx, owner, {
    title: 'Landing page',
    description: 'Static marketing site',
    expectedHourlyRateCents: 5000,
    expectedDurationHours: 10,
    tags: ['Web', 'web ', 'css'],
  });
}

export async function inProgressTask(ctx: WorkflowContext, hourlyRateCents = 5000): Promise<Task> {
  const project = await openProject(ctx);
  const task = await assignTask(ctx, buyer, { projectId: project.id, developerId: devA.id, hourlyRateCents });
  return await advanceTask(ctx, devA, task.id, 'in_progress');
}

export async function submittedTask(ctx: WorkflowContext, hourlyRateCents = 5000, hours = 8.5): Promise<Task> {
  const task = await inProgressTask(ctx, hourlyRateCents);
  return await submitSolution(ctx, devA, task.id, zipBytes(), hours);
}
