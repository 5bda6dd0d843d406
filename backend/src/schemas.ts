// Request body schemas for the HTTP API

import { z } from 'zod';
import { engineConfigOverridesSchema } from '../../lib/config';

export const emailRecordSchema = z.object({
  sender: z.string().min(1),
  recipient: z.string().min(1),
  weight: z.number().int().positive().safe().optional(),
  timestamp: z.union([z.number(), z.string()]).optional(),
});

// Traffic arrives either as raw CSV text or as already-parsed records
const trafficSource = {
  csvContent: z.string().optional(),
  records: z.array(emailRecordSchema).optional(),
};

// Multipart form fields are strings, so a config sent beside an uploaded file
// arrives as JSON text. Text that is not JSON is left for the schema to reject.
function parseJsonText(value: unknown): unknown {
  if (typeof value !== 'string') return value;
  try {
    return JSON.parse(value);
  } catch {
    return value;
  }
}

export const analyzeRequestSchema = z.object({
  ...trafficSource,
  config: z.preprocess(parseJsonText, engineConfigOverridesSchema.optional()),
});

export type AnalyzeRequest = z.infer<typeof analyzeRequestSchema>;

export const validateRequestSchema = z.object({
  csvContent: z.string().optional(),
});

export const shortestPathRequestSchema = z.object({
  ...trafficSource,
  source: z.string().min(1),
  target: z.string().min(1),
});

export type ShortestPathRequest = z.infer<typeof shortestPathRequestSchema>;

/** First issue of a failed parse, formatted as "path: message". */
export function describeIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) return 'Invalid request body';
  return issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message;
}
