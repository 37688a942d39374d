import type { PipelineConfig } from "../pipeline-config";
import { PipelineContext, PipelineStage, runInvocations } from "../pipeline-stage";
import { referenceDictPath, referenceFaiPath } from "../run-workspace";
import { StageResult } from "../stage-result";

/**
 * The .fai and .dict files gatk needs beside the reference. These are only
 * ever consumed by realignment so there is no point making them otherwise.
 */
export const referenceIndexStage: PipelineStage = {
  name: "reference-index",
  description: "samtools faidx and sequence dictionary for the reference",

  skipReason: (config: PipelineConfig) =>
    config.realign ? undefined : "only needed for realignment",

  async execute({ config, runner }: PipelineContext): Promise<StageResult> {
    if (!config.ref) throw new Error("Reference indexing cannot run without a reference");

    const dict = referenceDictPath(config.ref);

    return runInvocations(
      runner,
      [
        { stage: "reference-index", binary: config.tools.samtools, args: ["faidx", config.ref] },
        {
          stage: "reference-index",
          binary: config.tools.samtools,
          args: ["dict", config.ref, "-o", dict],
        },
      ],
      [referenceFaiPath(config.ref), dict]
    );
  },
};
