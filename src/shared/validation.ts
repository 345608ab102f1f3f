import type { z } from "zod";

/**
 * Group Zod issues by dotted path, e.g. { "retry.factor": ["..."] }.
 * Issues on the root object are keyed "_".
 */
export const issueDetails = (error: z.ZodError): Record<string, string[]> => {
  const details: Record<string, string[]> = {};
  for (const issue of error.issues) {
    const key = issue.path.length > 0 ? issue.path.join(".") : "_";
    details[key] = [...(details[key] ?? []), issue.message];
  }
  return details;
};
