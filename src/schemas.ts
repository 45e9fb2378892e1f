// Labor Law Assistant - Request schemas
// zod schemas for the JSON bodies the HTTP layer accepts.

import { z } from "zod";

export const QuestionRequestSchema = z.object({
  question: z
    .string()
    .min(5, "question must be at least 5 characters")
    .max(1000, "question must be at most 1000 characters"),
});

export const LoadLocalRequestSchema = z.object({
  filename: z.string().min(1, "filename is required"),
  local_data_path: z.string().min(1).nullish(),
  replace_collection: z.boolean().default(false),
  batch_size: z.number().int().min(1).max(1000).default(100),
});

/** One line per issue: "field: message". */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`);
}
