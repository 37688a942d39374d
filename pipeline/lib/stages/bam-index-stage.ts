import type { PipelineConfig } from "../pipeline-config";
import { PipelineContext, PipelineStage, runInvocations } from "../pipeline-stage";
import { StageResult } from "../stage-result";

export const bamIndexStage: PipelineStage = {
  name: "bam-index",
  description: "samtools index of the realigned BAM",

  // config validation has already rejected index without realign
  skipReason: (config: PipelineConfig) =>
    config.index && config.realign ? undefined : "indexing not requested",

  async execute({ config, workspace, runner }: PipelineContext): Promise<StageResult> {
    return runInvocations(
      runner,
      [{ stage: "bam-index", binary: config.tools.samtools, args: ["index", workspace.realignedBam] }],
      [`${workspace.realignedBam}.bai`]
    );
  },
};
