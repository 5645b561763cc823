// backend/services/shared/src/contracts/problem.contract.ts
import { z } from "zod";

/** RFC 7807 Problem+JSON */
export const zProblem = z.object({
  type: z.string().default("about:blank"),
  title: z.string(),
  status: z.number().int(),
  detail: z.string().optional(),
  instance: z.string().optional(),
  code: z.string().optional(),
});

export type Problem = z.infer<typeof zProblem>;
