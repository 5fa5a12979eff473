/**
 * SUT Report Zod Schemas
 *
 * Only the fields the harness judges are required; everything else the SUT
 * emits passes through untouched.
 */

import { z } from "zod";

export const JobResultSchema = z
  .object({
    jobname: z.string(),
    error: z.number().int(),
  })
  .passthrough();

export const SutReportSchema = z
  .object({
    jobs: z.array(JobResultSchema),
  })
  .passthrough();

export type JobResult = z.infer<typeof JobResultSchema>;
export type SutReport = z.infer<typeof SutReportSchema>;
