import type { ColumnType } from 'kysely';
import type { ProjectStatus, ProposalStatus, TaskStatus } from '../types.js';

type Timestamp = ColumnType<Date, Date | string, Date | string>;
// jsonb columns are written as serialized JSON text and read back parsed.
type Json = ColumnType<unknown, string, string>;
// bigint columns come back from pg as strings.
type Cents = ColumnType<string, number, number>;

export interface ProjectsTable {
  id: string;
  owner_id: string;
  title: string;
  description: string;
  expected_hourly_rate_cents: Cents;
  expected_duration_hours: number;
  tags: Json;
  status: ProjectStatus;
  created_at: Timestamp;
  updated_at: Timestamp;
}

export interface ProposalsTable {
  id: string;
  project_id: string;
  developer_id: string;
  cover_letter: string;
  proposed_hourly_rate_cents: Cents;
  estimated_hours: number;
  status: ProposalStatus;
  created_at: Timestamp;
  decided_at: Timestamp | null;
}

export interface TasksTable {
  id: string;
  project_id: string;
  developer_id: string;
  buyer_id: string;
  title: string;
  description: string;
  hourly_rate_cents: Cents;
  status: TaskStatus;
  solution_handle: string | null;
  time_spent_hours: number | null;
  submitted_at: Timestamp | null;
  created_at: Timestamp;
  updated_at: Timestamp;
}

export interface PaymentsTable {
  id: string;
  task_id: string;
  buyer_id: string;
  amount_cents: Cents;
  created_at: Timestamp;
}

export interface AuditLogTable {
  id: string;
  actor_type: string;
  actor_id: string | null;
  action: string;
  target_type: string | null;
  target_id: string | null;
  metadata: Json;
  created_at: Timestamp;
}

export interface DB {
  projects: ProjectsTable;
  proposals: ProposalsTable;
  tasks: TasksTable;
  payments: PaymentsTable;
  audit_log: AuditLogTable;
}
