import { z } from 'zod';

export function parseStoredJson<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  value: string,
  opts: { field?: string } = {},
): T {
  let parsed: unknown;
  try {
    parsed = JSON.parse(value) as unknown;
  } catch (err) {
    const field = opts.field ?? 'json';
    throw new Error(`Invalid JSON in ${field}: ${(err as Error).message}`);
  }

  const r = schema.safeParse(parsed);
  if (!r.success) {
    const field = opts.field ?? 'json';
    throw new Error(`Invalid value in ${field}: ${r.error.message}`);
  }
  return r.data;
}

export function serializeStoredJson<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  value: T,
  opts: { field?: string; indent?: number } = {},
): string {
  const r = schema.safeParse(value);
  if (!r.success) {
    const field = opts.field ?? 'json';
    throw new Error(`Invalid value in ${field}: ${r.error.message}`);
  }
  return JSON.stringify(r.data, null, opts.indent);
}

export const probeErrorKindSchema = z.enum([
  'timeout',
  'reset',
  'ssl_error',
  'refused',
  'proxy_connect',
  'other',
  // The proxy source never produced a usable endpoint, so nothing was probed.
  'no_proxy',
]);
export type ProbeErrorKind = z.infer<typeof probeErrorKindSchema>;

const httpCodeSchema = z.number().int().min(100).max(599);

export const probeStatusSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('healthy'), code: httpCodeSchema }),
  z.object({ kind: z.literal('anomalous'), code: httpCodeSchema }),
  z.object({ kind: z.literal('unavailable'), reason: probeErrorKindSchema }),
  z.object({ kind: z.literal('unstable'), reason: probeErrorKindSchema }),
  z.object({ kind: z.literal('proxy_not_configured') }),
]);
export type ProbeStatus = z.infer<typeof probeStatusSchema>;

export const reachabilityClassificationSchema = z.enum([
  'reachable (unverified)',
  'unreachable (unverified)',
  'reachable',
  'reachable with exit-path discrepancy',
  'restricted (HTTPS blocked locally)',
  'unreachable (needs external verification)',
]);
export type ReachabilityClassification = z.infer<typeof reachabilityClassificationSchema>;

export const reachabilityRecordJsonSchema = z.object({
  domain: z.string().min(1),
  checked_at: z.string().min(1),
  direct_https: probeStatusSchema,
  direct_http: probeStatusSchema,
  proxy_https: probeStatusSchema,
  proxy_http: probeStatusSchema,
  final: reachabilityClassificationSchema,
});
export type ReachabilityRecordJson = z.infer<typeof reachabilityRecordJsonSchema>;

export const reachabilityResultSetSchema = z.array(reachabilityRecordJsonSchema);
export type ReachabilityResultSet = z.infer<typeof reachabilityResultSetSchema>;
