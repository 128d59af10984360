export const ROLES = ['admin', 'buyer', 'developer'] as const;
export const TASK_STATUSES = ['assigned', 'in_progress', 'submitted', 'paid'] as const;

export type Role = (typeof ROLES)[number];
export type ProjectStatus = 'open' | 'closed';
export type ProposalStatus = 'pending' | 'accepted' | 'rejected' | 'withdrawn';
export type TaskStatus = (typeof TASK_STATUSES)[number];

/** Authenticated caller, supplied by the identity collaborator. */
export interface Principal {
  id: string;
  role: Role;
}

export interface Project {
  id: string;
  ownerId: string;
  title: string;
  description: string;
  expectedHourlyRateCents: number;
  expectedDurationHours: number;
  tags: string[];
  status: ProjectStatus;
  createdAt: number; // epoch ms
  updatedAt: number;
}

export interface Proposal {
  id: string;
  projectId: string;
  developerId: string;
  coverLetter: string;
  proposedHourlyRateCents: number;
  estimatedHours: number;
  status: ProposalStatus;
  createdAt: number;
  decidedAt?: number;
}

export interface Task {
  id: string;
  projectId: string;
  developerId: string;
  buyerId: string;
  title: string;
  description: string;
  hourlyRateCents: number;
  status: TaskStatus;
  // Set together, and only once the task is submitted.
  solutionHandle?: string;
  timeSpentHours?: number;
  submittedAt?: number;
  createdAt: number;
  updatedAt: number;
}

export interface Payment {
  id: string;
  taskId: string;
  buyerId: string;
  amountCents: number;
  createdAt: number;
}

export interface AuditEvent {
  id: string;
  actorType: string;
  actorId: string | null;
  action: string;
  targetType: string | null;
  targetId: string | null;
  metadata: Record<string, unknown>;
  createdAt: number;
}

export interface WorkflowSummary {
  projects: Record<ProjectStatus, number>;
  proposals: Record<ProposalStatus, number>;
  tasks: Record<TaskStatus, number>;
  payments: number;
  paidCentsTotal: number;
  hoursLogged: number;
}
