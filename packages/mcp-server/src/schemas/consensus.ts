import { z } from "zod";

export const ParameterValueSchema = z
  .union([z.string(), z.number(), z.boolean()])
  .describe("Scalar analysis parameter");

export const ConsensusAnalysisSchema = z.object({
  query: z
    .string()
    .optional()
    .describe("Free-text request, e.g. 'weekly outlook for 600000.SH'. The subject and parameters are extracted from it"),
  subject: z
    .string()
    .optional()
    .describe("Subject identifier such as 000001.SZ or AAPL. Takes precedence over the query"),
  parameters: z
    .record(ParameterValueSchema)
    .optional()
    .describe("Analysis parameters passed to every worker, e.g. { timeframe: '1w', depth: 'detailed' }"),
});

export const ConsensusAnalysisRequestSchema = ConsensusAnalysisSchema.refine(
  (v) => Boolean(v.query?.trim() || v.subject?.trim()),
  { message: "Provide either query or subject" },
);

export const SetWorkerWeightSchema = z.object({
  worker_id: z.string().min(1).describe("Registered worker id, e.g. technical"),
  weight: z.coerce.number().min(0).max(1).describe("Static weight in [0, 1]"),
});

export const CoordinatorHealthSchema = z.object({});

export type ConsensusAnalysisInput = z.infer<typeof ConsensusAnalysisSchema>;
export type SetWorkerWeightInput = z.infer<typeof SetWorkerWeightSchema>;
