import Fastify, { type FastifyError } from 'fastify';
import { type ZodTypeProvider, serializerCompiler, validatorCompiler } from 'fastify-type-provider-zod';
import { bearerToken, principalTokenSecret, verifyPrincipalToken } from './auth/tokens.js';
import { invalidInput, isWorkflowError } from './errors.js';
import { inc, renderPrometheusMetrics } from './metrics.js';
import {
  idParamsSchema,
  paymentCreateSchema,
  projectCreateSchema,
  projectUpdateSchema,
  proposalCreateSchema,
  submitQuerySchema,
  taskAdvanceSchema,
  taskAssignSchema,
} from './schemas.js';
import { type BlobStore, createBlobStoreFromEnv, maxUploadBytes } from './storage.js';
import { createStoreFromEnv, type WorkflowStore } from './store.js';
import type { Principal, Task } from './types.js';
import type { WorkflowContext } from './workflow/context.js';
import { getPayment, listMyPayments, payTask } from './workflow/payments.js';
import { closeProject, createProject, getProject, listMyProjects, updateProject } from './workflow/projects.js';
import {
  acceptProposal,
  hireProposal,
  listMyProposals,
  listProposalsForProject,
  rejectProposal,
  submitProposal,
  withdrawProposal,
} from './workflow/proposals.js';
import {
  advanceTask,
  assignTask,
  getDownload,
  getTask,
  listMyTasks,
  listTasksForProject,
  submitSolution,
} from './workflow/tasks.js';

declare module 'fastify' {
  interface FastifyRequest {
    principal?: Principal;
  }
}

export interface ServerDeps {
  store: WorkflowStore;
  blobs: BlobStore;
  tokenSecret?: string;
  clock?: () => number;
}

function loggerFromEnv(): false | { level: string } {
  const level = String(process.env.LOG_LEVEL ?? '').trim().toLowerCase();
  if (!level || level === 'off' || process.env.VITEST) return false;
  return { level };
}

function principalOf(request: { principal?: Principal }): Principal {
  if (!request.principal) throw new Error('route registered without authentication');
  return request.principal;
}

/** The stored handle is internal to the release gate; clients only learn whether one exists. */
function taskView(task: Task) {
  const { solutionHandle, ...rest } = task;
  return { ...rest, hasSolution: solutionHandle !== undefined };
}

export function buildServer(deps: ServerDeps) {
  const ctx: WorkflowContext = { store: deps.store, blobs: deps.blobs, clock: deps.clock };
  const tokenSecret = deps.tokenSecret ?? principalTokenSecret();

  const app = Fastify({ logger: loggerFromEnv() }).withTypeProvider<ZodTypeProvider>();
  app.setValidatorCompiler(validatorCompiler);
  app.setSerializerCompiler(serializerCompiler);

  app.addHook('onRequest', async () => {
    inc('requests_total');
  });

  app.addHook('onSend', async (_request, reply, payload) => {
    reply.header('x-content-type-options', 'nosniff');
    reply.header('referrer-policy', 'no-referrer');
    reply.header('cache-control', 'no-store');
    return payload;
  });

  // Solution archives arrive as the raw request body.
  app.addContentTypeParser(
    ['application/zip', 'application/octet-stream'],
    { parseAs: 'buffer', bodyLimit: maxUploadBytes() },
    (_req, body, done) => {
      done(null, body);
    }
  );

  app.setErrorHandler((err: FastifyError, request, reply) => {
    if (isWorkflowError(err)) {
      return reply.code(err.httpStatus).send({ error: { code: err.kind, message: err.message } });
    }
    if (err.validation || err.code === 'FST_ERR_VALIDATION') {
      return reply.code(400).send({ error: { code: 'invalid_request', message: err.message } });
    }
    const status = err.statusCode ?? 500;
    if (status >= 500) {
      request.log.error({ err }, 'request failed');
      return reply.code(500).send({ error: { code: 'internal_error', message: 'Internal error' } });
    }
    return reply.code(status).send({ error: { code: err.code ?? 'bad_request', message: err.message } });
  });

  app.get('/health', async () => ({ ok: true }));
  app.get('/health/metrics', async (_req, reply) => {
    const txt = await renderPrometheusMetrics(deps.store);
    reply.header('content-type', 'text/plain; version=0.0.4');
    return txt;
  });

  app.register(
    async (instance) => {
      const api = instance.withTypeProvider<ZodTypeProvider>();

      // onRequest runs before body parsing and validation, so an anonymous caller always sees 401.
      api.addHook('onRequest', async (request, reply) => {
        const token = bearerToken(request.headers.authorization);
        const principal = token ? verifyPrincipalToken(token, tokenSecret) : undefined;
        if (!principal) {
          const message = token ? 'Invalid bearer token' : 'Missing bearer token';
          return reply.code(401).send({ error: { code: 'unauthorized', message } });
        }
        request.principal = principal;
      });

      // Projects
      api.post('/projects', { schema: { body: projectCreateSchema } }, async (request, reply) => {
        const project = await createProject(ctx, principalOf(request), request.body);
        return reply.code(201).send({ project });
      });

      api.get('/projects', async (request) => ({ projects: await listMyProjects(ctx, principalOf(request)) }));

      api.get('/projects/:id', { schema: { params: idParamsSchema } }, async (request) => ({
        project: await getProject(ctx, principalOf(request), request.params.id),
      }));

      api.patch('/projects/:id', { schema: { params: idParamsSchema, body: projectUpdateSchema } }, async (request) => ({
        project: await updateProject(ctx, principalOf(request), request.params.id, request.body),
      }));

      api.post('/projects/:id/close', { schema: { params: idParamsSchema } }, async (request) => ({
        project: await closeProject(ctx, principalOf(request), request.params.id),
      }));

      api.get('/projects/:id/proposals', { schema: { params: idParamsSchema } }, async (request) => ({
        proposals: await listProposalsForProject(ctx, principalOf(request), request.params.id),
      }));

      api.get('/projects/:id/tasks', { schema: { params: idParamsSchema } }, async (request) => {
        const tasks = await listTasksForProject(ctx, principalOf(request), request.params.id);
        return { tasks: tasks.map(taskView) };
      });

      // Proposals
      api.post('/proposals', { schema: { body: proposalCreateSchema } }, async (request, reply) => {
        const proposal = await submitProposal(ctx, principalOf(request), request.body);
        return reply.code(201).send({ proposal });
      });

      api.get('/proposals', async (request) => ({ proposals: await listMyProposals(ctx, principalOf(request)) }));

      api.post('/proposals/:id/withdraw', { schema: { params: idParamsSchema } }, async (request) => ({
        proposal: await withdrawProposal(ctx, principalOf(request), request.params.id),
      }));

      api.post('/proposals/:id/accept', { schema: { params: idParamsSchema } }, async (request) => ({
        proposal: await acceptProposal(ctx, principalOf(request), request.params.id),
      }));

      api.post('/proposals/:id/reject', { schema: { params: idParamsSchema } }, async (request) => ({
        proposal: await rejectProposal(ctx, principalOf(request), request.params.id),
      }));

      api.post('/proposals/:id/hire', { schema: { params: idParamsSchema } }, async (request, reply) => {
        const hire = await hireProposal(ctx, principalOf(request), request.params.id);
        return reply.code(201).send({ proposal: hire.proposal, task: taskView(hire.task) });
      });

      // Tasks
      api.post('/tasks', { schema: { body: taskAssignSchema } }, async (request, reply) => {
        const task = await assignTask(ctx, principalOf(request), request.body);
        return reply.code(201).send({ task: taskView(task) });
      });

      api.get('/tasks', async (request) => {
        const tasks = await listMyTasks(ctx, principalOf(request));
        return { tasks: tasks.map(taskView) };
      });

      api.get('/tasks/:id', { schema: { params: idParamsSchema } }, async (request) => ({
        task: taskView(await getTask(ctx, principalOf(request), request.params.id)),
      }));

      api.post('/tasks/:id/status', { schema: { params: idParamsSchema, body: taskAdvanceSchema } }, async (request) => ({
        task: taskView(await advanceTask(ctx, principalOf(request), request.params.id, request.body.status)),
      }));

      api.post(
        '/tasks/:id/submission',
        { schema: { params: idParamsSchema, querystring: submitQuerySchema } },
        async (request) => {
          const body: unknown = request.body;
          let bytes: Uint8Array;
          if (Buffer.isBuffer(body)) bytes = body;
          else if (body === undefined || body === null) bytes = new Uint8Array();
          else throw invalidInput('unsupported_solution_body');

          const task = await submitSolution(ctx, principalOf(request), request.params.id, bytes, request.query.timeSpentHours);
          return { task: taskView(task) };
        }
      );

      api.get('/tasks/:id/solution', { schema: { params: idParamsSchema } }, async (request, reply) => {
        const dl = await getDownload(ctx, principalOf(request), request.params.id);
        reply.header('content-type', 'application/zip');
        reply.header('content-disposition', `attachment; filename="${dl.taskId}.zip"`);
        reply.header('x-payment-id', dl.paymentId);
        return reply.send(Buffer.from(dl.bytes));
      });

      // Payments
      api.post('/payments', { schema: { body: paymentCreateSchema } }, async (request, reply) => {
        const receipt = await payTask(ctx, principalOf(request), request.body.taskId);
        return reply.code(201).send({ payment: receipt.payment, task: taskView(receipt.task) });
      });

      api.get('/payments', async (request) => ({ payments: await listMyPayments(ctx, principalOf(request)) }));

      api.get('/payments/:id', { schema: { params: idParamsSchema } }, async (request) => ({
        payment: await getPayment(ctx, principalOf(request), request.params.id),
      }));
    },
    { prefix: '/api' }
  );

  return app;
}

if (process.env.NODE_ENV !== 'test' && import.meta.url === `file://${process.argv[1]}`) {
  // Load .env before any configuration is read.
  await import('dotenv/config');
  const store = await createStoreFromEnv();
  const app = buildServer({ store, blobs: createBlobStoreFromEnv() });
  app.addHook('onClose', async () => {
    await store.close();
  });
  const port = process.env.PORT ? Number(process.env.PORT) : 3000;
  await app.listen({ port, host: '0.0.0.0' });
  console.log(`[api] running on :${port}`);
}
