import type { PipelineConfig } from "../pipeline-config";
import { PipelineContext, PipelineStage, runInvocations } from "../pipeline-stage";
import type { RunWorkspace } from "../run-workspace";
import { StageResult } from "../stage-result";

/**
 * The BAM that variants get called from - decided purely by configuration,
 * never by what happens to be lying around on disk.
 */
export function callingInputBam(config: PipelineConfig, workspace: RunWorkspace): string {
  return config.realign ? workspace.realignedBam : workspace.sortedBam;
}

export const variantCallingStage: PipelineStage = {
  name: "variant-calling",
  description: "bcftools mpileup and call",

  skipReason: () => undefined,

  async execute({ config, workspace, outputs, runner }: PipelineContext): Promise<StageResult> {
    if (!config.ref) throw new Error("Variant calling cannot run without a reference");

    const { bcftools } = config.tools;

    return runInvocations(
      runner,
      [
        {
          stage: "variant-calling",
          binary: bcftools,
          args: [
            "mpileup",
            "-Ou",
            "-f",
            config.ref,
            "-o",
            workspace.pileup,
            callingInputBam(config, workspace),
          ],
        },
        {
          stage: "variant-calling",
          binary: bcftools,
          args: ["call", "-vm", "-O", "z", "-o", outputs.vcfGz, workspace.pileup],
        },
      ],
      [workspace.pileup, outputs.vcfGz]
    );
  },
};
