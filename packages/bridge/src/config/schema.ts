import { z } from 'zod';
import { indexLikePatternMessage, isIndexLikePattern } from '../mapping/glob.js';

export const stringMapSchema = z.record(z.string(), z.string());

export const stringListSchema = z.array(z.string());

export const modelRoutesSchema = z
  .record(z.string(), z.object({ path: z.string().optional() }).passthrough())
  .superRefine((routes, ctx) => {
    for (const pattern of Object.keys(routes)) {
      if (isIndexLikePattern(pattern)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [pattern],
          message: indexLikePatternMessage(pattern),
        });
      }
    }
  });

export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const location = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${location}: ${issue.message}`;
    })
    .join('; ');
}
