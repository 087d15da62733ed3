import { z } from 'zod';

export const s3DestinationSchema = z.object({
  bucket: z.string().min(1).max(255),
  prefix: z.string().max(512).optional().default(''),
});

export const gdriveDestinationSchema = z.object({
  folder_id: z.string().min(1).max(255).nullable().optional(),
});

export const rcloneDestinationSchema = z.object({
  remote: z.string().min(1).max(255).optional(),
  path: z.string().max(1024),
});

/**
 * Destination config of a job: at least zero, at most one entry per provider
 */
export const destinationConfigSchema = z.object({
  s3: s3DestinationSchema.optional(),
  gdrive: gdriveDestinationSchema.optional(),
  rclone: rcloneDestinationSchema.optional(),
}).strict();
