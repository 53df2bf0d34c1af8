import { z } from 'zod';

import { ValidationError } from '@core/errors/validation.error.js';

import { isISODate } from '@utils/time.js';

const isoDate = z.string().trim().refine(isISODate, { message: 'expected a yyyy-MM-dd date' });

export const ChatBodySchema = z.object({
  sessionId: z.string().trim().min(1).max(128),
  message: z.string().trim().min(1).max(2000),
  employeeId: z.string().trim().min(1).max(32).optional(),
});

export const ApplyLeaveBodySchema = z.object({
  emp_id: z.string().trim().min(1).max(32),
  leave_type: z.string().trim().min(1).max(32),
  from_date: isoDate,
  to_date: isoDate,
  reason: z.string().trim().max(500).optional(),
});

export type ChatBody = z.infer<typeof ChatBodySchema>;
export type ApplyLeaveBody = z.infer<typeof ApplyLeaveBodySchema>;

/** Parses a request body or throws a 422 listing every invalid field. */
export function parseBody<S extends z.ZodTypeAny>(schema: S, body: unknown): z.infer<S> {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => ({ path: i.path.join('.'), message: i.message }));
    throw new ValidationError('Invalid request body', { issues });
  }
  return parsed.data;
}
