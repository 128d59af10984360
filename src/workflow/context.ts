import type { BlobStore } from '../storage.js';
import type { WorkflowStore } from '../store.js';
import type { Principal, Role } from '../types.js';
import { forbidden, invalidInput } from '../errors.js';

export interface WorkflowContext {
  store: WorkflowStore;
  blobs: BlobStore;
  clock?: () => number;
}

export function now(ctx: WorkflowContext): number {
  return ctx.clock ? ctx.clock() : Date.now();
}

export function requireRole(principal: Principal, ...roles: Role[]) {
  if (!roles.includes(principal.role)) throw forbidden('role_not_allowed');
}

// rate × hours stays well inside Number.MAX_SAFE_INTEGER at these caps.
export const MAX_RATE_CENTS = 100_000_000;
export const MAX_HOURS = 100_000;

export function assertHours(value: number, reason: string) {
  if (!Number.isFinite(value) || value <= 0 || value > MAX_HOURS) throw invalidInput(reason);
}

export function assertCents(value: number, reason: string) {
  if (!Number.isSafeInteger(value) || value < 0 || value > MAX_RATE_CENTS) throw invalidInput(reason);
}

export function assertText(value: string, reason: string) {
  if (!value.trim()) throw invalidInput(reason);
}
