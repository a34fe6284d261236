// apps/http/src/app.ts
import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';
import { z, ZodError } from 'zod';
import {
  ConditionSchema, ValidationError, isRecsetError, parseOrThrow, toIssues,
  type AttributeValue, type Condition, type DataRecord, type ErrorCode, type Issue, type ScopeArg, type SortDirection
} from '@recset/core';
import type { Database, QueryPlan } from '@recset/query';
import type { AppConfig } from './config';

// ---- request bodies ----
type StepBody =
  | { op: 'scope'; name: string; args?: ScopeArg[] }
  | { op: 'where'; attribute: string; condition: Condition }
  | { op: 'order'; column: string; direction?: SortDirection }
  | { op: 'join'; association: string }
  | { op: 'merge'; query: PlanBody }
  | { op: 'limit'; count: number }
  | { op: 'offset'; count: number };

interface PlanBody {
  kind: string;
  steps?: StepBody[];
}

const PlanSchema: z.ZodType<PlanBody> = z.lazy(() =>
  z.object({ kind: z.string().min(1), steps: z.array(StepSchema).optional() }).strict()
);

const StepSchema: z.ZodType<StepBody> = z.discriminatedUnion('op', [
  z.object({ op: z.literal('scope'), name: z.string().min(1), args: z.array(ConditionSchema).optional() }).strict(),
  z.object({ op: z.literal('where'), attribute: z.string().min(1), condition: ConditionSchema }).strict(),
  z.object({ op: z.literal('order'), column: z.string().min(1), direction: z.enum(['asc', 'desc']).optional() }).strict(),
  z.object({ op: z.literal('join'), association: z.string().min(1) }).strict(),
  z.object({ op: z.literal('merge'), query: PlanSchema }).strict(),
  z.object({ op: z.literal('limit'), count: z.number() }).strict(),
  z.object({ op: z.literal('offset'), count: z.number() }).strict()
]);

const ResultSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('rows') }).strict(),
  z.object({ type: z.literal('count') }).strict(),
  z.object({ type: z.literal('first') }).strict(),
  z.object({ type: z.literal('average'), attribute: z.string().min(1) }).strict(),
  z.object({ type: z.literal('pluck'), attribute: z.string().min(1) }).strict()
]);

const QueryBodySchema = z.object({
  kind: z.string().min(1),
  steps: z.array(StepSchema).default([]),
  result: ResultSchema.default({ type: 'rows' })
}).strict();

type ResultSpec = z.infer<typeof ResultSchema>;

const ReportQuerySchema = z.object({
  minDuration: z.coerce.number().int().min(0).optional()
});

// ---- errors ----
const STATUS: Record<ErrorCode, number> = {
  RS_VALIDATION: 400,
  RS_NOT_FOUND: 404,
  RS_EMPTY_SET: 404,
  RS_UNKNOWN_KIND: 422,
  RS_DUPLICATE_KIND: 422,
  RS_DUPLICATE_ASSOCIATION: 422,
  RS_UNKNOWN_ASSOCIATION: 422,
  RS_DUPLICATE_SCOPE: 422,
  RS_UNKNOWN_SCOPE: 422,
  RS_PLAN_MATERIALIZED: 422
};

export interface ClassifiedError {
  code: string;
  status: number;
  message: string;
  issues?: Issue[];
}

export function classifyError(e: unknown): ClassifiedError {
  if (e instanceof ZodError) {
    return { code: 'RS_VALIDATION', status: 400, message: 'Invalid request', issues: toIssues(e) };
  }
  if (e instanceof ValidationError) {
    return { code: e.code, status: STATUS[e.code], message: e.message, issues: e.issues };
  }
  if (isRecsetError(e)) return { code: e.code, status: STATUS[e.code], message: e.message };
  // fastify and plugin rejections (bad JSON, rate limit) carry their own status
  if (typeof e === 'object' && e !== null && 'statusCode' in e && typeof e.statusCode === 'number' && e.statusCode < 500) {
    const code = 'code' in e && typeof e.code === 'string' ? e.code : 'RS_REQUEST';
    const message = 'message' in e && typeof e.message === 'string' ? e.message : 'Request rejected';
    return { code, status: e.statusCode, message };
  }
  return { code: 'RS_INTERNAL', status: 500, message: e instanceof Error ? e.message : String(e) };
}

// ---- query evaluation ----
function buildPlan(db: Database, body: PlanBody): QueryPlan {
  let plan = db.query(body.kind);
  for (const step of body.steps ?? []) plan = applyStep(db, plan, step);
  return plan;
}

function applyStep(db: Database, plan: QueryPlan, step: StepBody): QueryPlan {
  switch (step.op) {
    case 'scope': return plan.scope(step.name, ...(step.args ?? []));
    case 'where': return plan.where(step.attribute, step.condition);
    case 'order': return plan.order(step.column, step.direction);
    case 'join': return plan.join(step.association);
    case 'merge': return plan.merge(buildPlan(db, step.query));
    case 'limit': return plan.limit(step.count);
    case 'offset': return plan.offset(step.count);
  }
}

type QueryResult = DataRecord[] | DataRecord | number | AttributeValue[];

function evaluate(plan: QueryPlan, result: ResultSpec): QueryResult {
  switch (result.type) {
    case 'rows': return plan.toSequence();
    case 'count': return plan.count();
    case 'first': return plan.first();
    case 'average': return plan.average(result.attribute);
    case 'pluck': return plan.pluck(result.attribute);
  }
}

// ---- report ----
export interface Report {
  minDuration: number;
  videos: { id: number; name: AttributeValue; engine: AttributeValue; duration: AttributeValue }[];
  playlists: { id: number; name: AttributeValue; videos: number; averageDuration: number }[];
}

export function buildReport(db: Database, minDuration: number): Report {
  const videos = db.query('video')
    .scope('duration_min', minDuration)
    .scope('sort', 'engine')
    .toSequence()
    .map((v) => ({ id: v.id, name: v.attributes.name, engine: v.attributes.engine, duration: v.attributes.duration }));

  const playlists = db.query('playlist').order('name').toSequence().map((p) => {
    const name = p.attributes.name;
    return {
      id: p.id,
      name,
      videos: db.query('video').scope('list', name).count(),
      // display value: truncated, not rounded
      averageDuration: Math.trunc(db.query('video').scope('list', name).average('duration'))
    };
  });

  return { minDuration, videos, playlists };
}

export interface BuildAppOptions {
  config: AppConfig;
  db: Database;
}

export async function buildApp({ config, db }: BuildAppOptions): Promise<FastifyInstance> {
  const app = Fastify({
    logger: { level: config.logLevel },
    requestIdHeader: 'x-request-id',
    bodyLimit: 1_000_000
  });

  await app.register(cors, {
    origin: (origin, cb) => {
      const allow = config.corsOrigins;
      if (!origin || allow.length === 0 || allow.includes(origin)) return cb(null, true);
      cb(new Error('CORS not allowed'), false);
    },
    credentials: true
  });

  await app.register(rateLimit, {
    max: config.rateLimitMax,
    timeWindow: '1 minute'
  });

  app.addHook('onSend', async (req, reply, payload) => {
    reply.header('x-request-id', req.id);
    return payload;
  });

  app.setErrorHandler((err, req, reply) => {
    const { code, status, message, issues } = classifyError(err);
    if (status >= 500) req.log.error({ err, requestId: req.id }, 'request-error');
    else req.log.info({ code, requestId: req.id }, 'request-rejected');
    reply.status(status).send({
      code,
      message,
      requestId: req.id,
      ...(issues && issues.length ? { issues } : {})
    });
  });

  app.get('/healthz', async () => ({ ok: true }));

  app.get('/kinds', async () => ({
    kinds: db.store.kinds().map((k) => ({
      name: k.name,
      attributes: k.attributes,
      count: db.store.count(k.name),
      associations: db.associations.list(k.name).map((a) => ({ name: a.name, type: a.type, target: a.target })),
      scopes: db.scopes.list(k.name)
    }))
  }));

  app.post('/query', async (req) => {
    const t0 = Date.now();
    const body = parseOrThrow(QueryBodySchema, req.body, 'Invalid query');
    const plan = buildPlan(db, body);
    const steps = plan.explain();
    const result = evaluate(plan, body.result);
    const ms = Date.now() - t0;
    req.log.debug({ kind: plan.kind, steps, ms }, 'query');
    return { kind: plan.kind, result, meta: { steps, ms } };
  });

  app.get('/report', async (req) => {
    const { minDuration } = parseOrThrow(ReportQuerySchema, req.query, 'Invalid report query');
    return buildReport(db, minDuration ?? config.reportMinDuration);
  });

  return app;
}
