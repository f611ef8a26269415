import { z } from 'zod';

// ─── Log Event Zod Schemas ───────────────────────────────

export const LogEventTypeSchema = z.enum([
  'SERVER_START',
  'SERVICE_CREATED',
  'SERVICE_EXISTS',
  'CREATION_FAILED',
  'ERROR',
]);

export const LogLevelSchema = z.enum(['INFO', 'WARN', 'ERROR']);

export const LogEventSchema = z.object({
  id: z.string(),
  timestamp: z.number(),
  type: LogEventTypeSchema,
  requestId: z.string().optional(),
  payload: z.unknown(),
  level: LogLevelSchema,
});
