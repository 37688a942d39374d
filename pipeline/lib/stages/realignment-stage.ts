import type { PipelineConfig } from "../pipeline-config";
import { PipelineContext, PipelineStage, runInvocations } from "../pipeline-stage";
import { INDEL_REALIGNER_HEAP, TARGET_CREATOR_HEAP } from "../environment-constants";
import { StageResult } from "../stage-result";

/**
 * GATK 3 local realignment around known indels.
 *
 * Both walkers are very noisy on stderr - all of it goes to the workspace
 * realignment log rather than the console.
 */
export const realignmentStage: PipelineStage = {
  name: "realignment",
  description: "gatk RealignerTargetCreator and IndelRealigner",

  skipReason: (config: PipelineConfig) =>
    config.realign ? undefined : "realignment not requested",

  async execute({ config, workspace, runner }: PipelineContext): Promise<StageResult> {
    if (!config.ref || !config.millsFile)
      throw new Error("Realignment cannot run without a reference and known indels file");

    const { java, gatkJar } = config.tools;

    return runInvocations(
      runner,
      [
        {
          stage: "realignment",
          binary: java,
          args: [
            TARGET_CREATOR_HEAP,
            "-jar",
            gatkJar,
            "-T",
            "RealignerTargetCreator",
            "-R",
            config.ref,
            "-I",
            workspace.sortedBam,
            "-o",
            workspace.intervals,
            "--known",
            config.millsFile,
          ],
          stderrLog: { path: workspace.realignmentLog, append: false },
        },
        {
          stage: "realignment",
          binary: java,
          args: [
            INDEL_REALIGNER_HEAP,
            "-jar",
            gatkJar,
            "-T",
            "IndelRealigner",
            "-R",
            config.ref,
            "-I",
            workspace.sortedBam,
            "-targetIntervals",
            workspace.intervals,
            "-known",
            config.millsFile,
            "-o",
            workspace.realignedBam,
          ],
          stderrLog: { path: workspace.realignmentLog, append: true },
        },
      ],
      [workspace.intervals, workspace.realignedBam, workspace.realignmentLog]
    );
  },
};
