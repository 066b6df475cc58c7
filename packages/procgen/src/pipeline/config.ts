import { PipelineConfigSchema, parseWith } from "@roomforge/contracts";
import {
  DEFAULT_PIPELINE_CONFIG,
  type PipelineConfig,
  type ValidatedPipelineConfig,
} from "./types";

/**
 * Validate a pipeline config and fill in defaults.
 * Throws CONFIG_INVALID when the input does not match the schema.
 */
export function validatePipelineConfig(
  config: PipelineConfig = {},
): ValidatedPipelineConfig {
  const parsed = parseWith(PipelineConfigSchema, config, "pipeline config")
    .getOrThrow();

  return {
    seed: parsed.seed ?? DEFAULT_PIPELINE_CONFIG.seed,
    trace: parsed.trace ?? DEFAULT_PIPELINE_CONFIG.trace,
    captureSnapshots:
      parsed.captureSnapshots ?? DEFAULT_PIPELINE_CONFIG.captureSnapshots,
  };
}
