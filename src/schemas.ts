import { z } from 'zod';
import { TASK_STATUSES } from './types.js';
import { MAX_HOURS, MAX_RATE_CENTS } from './workflow/context.js';

const cents = z.number().int().nonnegative().max(MAX_RATE_CENTS);
const hours = z.number().positive().max(MAX_HOURS);
const tags = z.array(z.string().min(1).max(40)).max(20);

export const idParamsSchema = z.object({ id: z.string().min(1).max(64) });

export const projectCreateSchema = z.object({
  title: z.string().min(1).max(200),
  description: z.string().max(20_000).optional(),
  expectedHourlyRateCents: cents,
  expectedDurationHours: hours,
  tags: tags.optional(),
});

export const projectUpdateSchema = z
  .object({
    title: z.string().min(1).max(200),
    description: z.string().max(20_000),
    expectedHourlyRateCents: cents,
    expectedDurationHours: hours,
    tags,
  })
  .partial()
  .refine((p) => Object.keys(p).length > 0, { message: 'empty patch' });

export const proposalCreateSchema = z.object({
  projectId: z.string().min(1).max(64),
  coverLetter: z.string().max(20_000).optional(),
  proposedHourlyRateCents: cents,
  estimatedHours: hours,
});

export const taskAssignSchema = z.object({
  projectId: z.string().min(1).max(64),
  developerId: z.string().min(1).max(128),
  hourlyRateCents: cents,
  title: z.string().min(1).max(200).optional(),
  description: z.string().max(20_000).optional(),
});

export const taskAdvanceSchema = z.object({
  status: z.enum(TASK_STATUSES),
});

// The lower bound is left to the workflow, which reports invalid_time_spent.
export const submitQuerySchema = z.object({
  timeSpentHours: z.coerce.number().max(MAX_HOURS),
});

export const paymentCreateSchema = z.object({
  taskId: z.string().min(1).max(64),
});
