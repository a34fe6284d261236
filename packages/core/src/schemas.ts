// packages/core/src/schemas.ts
import { z, type ZodError, type ZodTypeAny } from 'zod';
import type { AttributeDef, AttributeType } from './types';
import { ValidationError, type Issue } from './errors';

const IDENT = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

export const AttributeTypeEnum = z.enum(['string', 'integer', 'float', 'boolean']);

export const AttributeValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const AttributeDefSchema = z.object({
  type: AttributeTypeEnum,
  required: z.boolean().optional(),
  default: AttributeValueSchema.optional()
}).strict();

export const AttributeSchemaSchema = z.record(
  z.string().regex(IDENT, 'invalid attribute name'),
  z.union([AttributeTypeEnum, AttributeDefSchema])
).refine((s) => !('id' in s), { message: 'id is reserved' });

export const KindNameSchema = z.string().regex(IDENT, 'invalid kind name');

export const RangeSchema = z.object({
  from: z.union([z.string(), z.number()]).optional(),
  to: z.union([z.string(), z.number()]).optional()
}).strict();

export const ConditionSchema = z.union([
  AttributeValueSchema,
  z.array(AttributeValueSchema),
  RangeSchema
]);

const Ident = z.string().regex(IDENT);

export const AssociationSpecSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('one-to-one'), target: Ident, foreignKey: Ident }).strict(),
  z.object({ type: z.literal('one-to-many'), target: Ident, foreignKey: Ident }).strict(),
  z.object({
    type: z.literal('many-to-many-through'),
    target: Ident,
    through: Ident,
    sourceKey: Ident,
    targetKey: Ident,
    dedupe: z.boolean().optional()
  }).strict()
]);

// per-attribute value schema; optional attributes accept null
export function valueSchema(def: AttributeDef): ZodTypeAny {
  const base = scalar(def.type);
  return def.required ? base : base.nullable().optional();
}

function scalar(type: AttributeType): ZodTypeAny {
  switch (type) {
    case 'string': return z.string();
    case 'integer': return z.number().int();
    case 'float': return z.number().finite();
    case 'boolean': return z.boolean();
  }
}

// compiled insert schema for a kind (unknown attributes rejected)
export function recordSchema(attributes: Record<string, AttributeDef>) {
  const shape: Record<string, ZodTypeAny> = {};
  for (const [name, def] of Object.entries(attributes)) shape[name] = valueSchema(def);
  return z.object(shape).strict();
}

export function toIssues(e: ZodError): Issue[] {
  return e.issues.map((i) => ({ path: i.path.join('.'), msg: i.message }));
}

/** parse or throw ValidationError with zod's issues */
export function parseOrThrow<S extends ZodTypeAny>(schema: S, input: unknown, what: string): z.infer<S> {
  const res = schema.safeParse(input);
  if (!res.success) throw new ValidationError(what, toIssues(res.error));
  return res.data;
}
