import { z } from 'zod';

/** Schema for one persisted ticket file (one per package) */
export const TicketFileSchema = z.object({
  package_name: z.string().min(1),
  old_version: z.string().nullable(),
  new_version: z.string().nullable(),
  files: z.array(z.string()),
  body_description: z.string(),
}).refine((t) => t.old_version !== null || t.new_version !== null, {
  message: 'at least one of old_version and new_version must be set',
});

/** A persisted ticket file */
export type TicketFile = z.infer<typeof TicketFileSchema>;
