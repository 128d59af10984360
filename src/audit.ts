import { nanoid } from 'nanoid';
import type { WorkflowTx } from './store.js';
import type { Principal } from './types.js';

export interface AuditEventInput {
  action: string;
  targetType?: string | null;
  targetId?: string | null;
  metadata?: Record<string, unknown>;
}

/** Records `evt` inside `tx`, so it commits or rolls back with the transition it describes. */
export async function writeAuditEvent(tx: WorkflowTx, actor: Principal, evt: AuditEventInput, now = Date.now()) {
  await tx.insertAuditEvent({
    id: nanoid(12),
    actorType: actor.role,
    actorId: actor.id,
    action: evt.action,
    targetType: evt.targetType ?? null,
    targetId: evt.targetId ?? null,
    metadata: evt.metadata ?? {},
    createdAt: now,
  });
}
