export type WorkflowErrorKind = 'forbidden' | 'invalid_state' | 'not_found' | 'payment_required' | 'invalid_input';

const HTTP_STATUS: Record<WorkflowErrorKind, number> = {
  forbidden: 403,
  invalid_state: 409,
  not_found: 404,
  payment_required: 402,
  invalid_input: 400,
};

/**
 * Terminal failure of a workflow operation. `message` is a stable snake_case reason
 * (e.g. `project_not_open`); callers may retry `invalid_state` after re-reading state.
 */
export class WorkflowError extends Error {
  readonly kind: WorkflowErrorKind;

  constructor(kind: WorkflowErrorKind, reason: string) {
    super(reason);
    this.name = 'WorkflowError';
    this.kind = kind;
  }

  get httpStatus(): number {
    return HTTP_STATUS[this.kind];
  }
}

export function isWorkflowError(err: unknown): err is WorkflowError {
  return err instanceof WorkflowError;
}

export const forbidden = (reason = 'forbidden') => new WorkflowError('forbidden', reason);
export const invalidState = (reason: string) => new WorkflowError('invalid_state', reason);
export const notFound = (reason: string) => new WorkflowError('not_found', reason);
export const paymentRequired = (reason = 'payment_required') => new WorkflowError('payment_required', reason);
export const invalidInput = (reason: string) => new WorkflowError('invalid_input', reason);
