import { z } from 'zod';

export const alertMethodSchema = z.enum(['none', 'ssh', 'telegram']);
export type AlertMethod = z.infer<typeof alertMethodSchema>;

export const originSchemeSchema = z.enum(['http', 'https']);

// Spellings accepted for ORIGIN_ALERT_METHOD before enum validation.
export const ALERT_METHOD_ALIASES: Record<string, AlertMethod> = {
  '': 'none',
  off: 'none',
  false: 'none',
  '0': 'none',
  tg: 'telegram',
};

export const truthyFlagSchema = z
  .string()
  .transform((s) => ['1', 'true', 'yes', 'on'].includes(s.trim().toLowerCase()));
