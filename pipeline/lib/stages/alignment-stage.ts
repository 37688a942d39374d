import { PipelineContext, PipelineStage, runInvocations } from "../pipeline-stage";
import { READ_GROUP } from "../environment-constants";
import { StageResult } from "../stage-result";

/**
 * Map the reads to the reference and end up with a coordinate sorted,
 * indexed BAM.
 */
export const alignmentStage: PipelineStage = {
  name: "alignment",
  description: "bwa alignment, fixmate, sort and index",

  skipReason: () => undefined,

  async execute({ config, workspace, runner }: PipelineContext): Promise<StageResult> {
    const { bwa, samtools } = config.tools;

    // preflight guarantees both of these - but the types don't know that
    if (!config.ref || !config.reads1)
      throw new Error("Alignment cannot run without a reference and reads");

    // with no second reads file bwa does a single ended alignment
    const reads = config.reads2 ? [config.reads1, config.reads2] : [config.reads1];

    return runInvocations(
      runner,
      [
        { stage: "alignment", binary: bwa, args: ["index", config.ref] },
        {
          stage: "alignment",
          binary: bwa,
          args: ["mem", "-R", READ_GROUP, "-o", workspace.sam, config.ref, ...reads],
        },
        {
          stage: "alignment",
          binary: samtools,
          args: ["fixmate", "-O", "bam", workspace.sam, workspace.fixmateBam],
        },
        {
          stage: "alignment",
          binary: samtools,
          args: [
            "sort",
            "-O",
            "bam",
            "-o",
            workspace.sortedBam,
            "-T",
            workspace.sortTempPrefix,
            workspace.fixmateBam,
          ],
        },
        { stage: "alignment", binary: samtools, args: ["index", workspace.sortedBam] },
      ],
      [workspace.sam, workspace.fixmateBam, workspace.sortedBam, `${workspace.sortedBam}.bai`]
    );
  },
};
