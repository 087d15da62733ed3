import { z } from 'zod';
import parser from 'cron-parser';
import { destinationConfigSchema } from './destinations.js';

/**
 * Validate a cron expression. Schedules are stored only; nothing evaluates them.
 */
export function validateCronExpression(expression: string): { valid: boolean; error?: string } {
  try {
    parser.parseExpression(expression);
    return { valid: true };
  } catch (error) {
    return {
      valid: false,
      error: error instanceof Error ? error.message : 'Invalid cron expression'
    };
  }
}

export const createBackupJobSchema = z.object({
  name: z.string().min(1, 'Name is required').max(255),
  type: z.enum(['full', 'files', 'database']).default('full'),
  source: z.string().max(1024).nullable().optional(),
  destination: destinationConfigSchema.default({}),
  schedule: z.string().max(100).nullable().optional(),
  retention_days: z.number().int().min(1).max(3650).optional().default(30),
}).superRefine((data, ctx) => {
  if (data.schedule) {
    const validation = validateCronExpression(data.schedule);
    if (!validation.valid) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Invalid cron expression: ${validation.error}`,
        path: ['schedule'],
      });
    }
  }
});

export const updateBackupJobStatusSchema = z.object({
  status: z.enum(['active', 'paused', 'deleted']),
});

export const createBackupSchema = z.object({
  job_id: z.number().int().positive().nullable().optional(),
});

export type CreateBackupJobInput = z.infer<typeof createBackupJobSchema>;
export type UpdateBackupJobStatusInput = z.infer<typeof updateBackupJobStatusSchema>;
export type CreateBackupInput = z.infer<typeof createBackupSchema>;
