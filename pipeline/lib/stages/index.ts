import type { PipelineStage } from "../pipeline-stage";
import { alignmentStage } from "./alignment-stage";
import { referenceIndexStage } from "./reference-index-stage";
import { realignmentStage } from "./realignment-stage";
import { bamIndexStage } from "./bam-index-stage";
import { variantCallingStage } from "./variant-calling-stage";
import { decompressStage } from "./decompress-stage";
import { bedConversionStage } from "./bed-conversion-stage";

/**
 * The pipeline - the order here is the order of execution and is not configurable.
 */
export const PIPELINE_STAGES: readonly PipelineStage[] = [
  alignmentStage,
  referenceIndexStage,
  realignmentStage,
  bamIndexStage,
  variantCallingStage,
  decompressStage,
  bedConversionStage,
];
