import { z } from 'zod';

export const remotePdfRequest = z.object({
  pdf_url: z.string(),
});

export const invocationEvent = z.object({
  body: z.unknown().optional(),
});
