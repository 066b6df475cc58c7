import { z } from "zod";

const UINT32_MAX = 0xffffffff;

export const SeedSchema = z
  .number()
  .int()
  .min(0, { message: "Seed must be a non-negative integer" })
  .max(UINT32_MAX, { message: "Seed must fit in uint32" });

export const PipelineConfigSchema = z.object({
  seed: SeedSchema.optional(),
  trace: z.boolean().optional(),
  captureSnapshots: z.boolean().optional(),
});

export const AdjacencySchema = z.enum(["moore", "von-neumann"]);

export const WallSynthesisOptionsSchema = z.object({
  adjacency: AdjacencySchema.optional(),
  preservePortals: z.boolean().optional(),
});

export const EdgePortalsOptionsSchema = z.object({
  count: z
    .number()
    .int()
    .min(0, { message: "Portal count must be non-negative" })
    .max(1024, { message: "Portal count cannot exceed 1024" }),
});

export type PipelineConfigInput = z.infer<typeof PipelineConfigSchema>;
export type Adjacency = z.infer<typeof AdjacencySchema>;
