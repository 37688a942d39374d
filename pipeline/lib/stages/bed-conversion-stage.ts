import type { PipelineConfig } from "../pipeline-config";
import { StageFailedError } from "../pipeline-errors";
import { PipelineContext, PipelineStage } from "../pipeline-stage";
import { StageResult } from "../stage-result";
import { convertVcfToBed } from "../vcf-to-bed";

/**
 * Optional tail of the pipeline - tabulate the called variants and split
 * them into SNPs and indels. Off unless explicitly asked for.
 */
export const bedConversionStage: PipelineStage = {
  name: "bed-conversion",
  description: "VCF to BED, SNP and indel tables",

  skipReason: (config: PipelineConfig) =>
    config.bed ? undefined : "bed conversion not requested",

  async execute({ outputs }: PipelineContext): Promise<StageResult> {
    try {
      await convertVcfToBed(outputs.vcf, outputs);
    } catch (e) {
      if (!(e instanceof Error)) throw e;

      // no tool is involved here so there is no exit code - the error message stands in for stderr
      return StageResult.Failed(
        new StageFailedError(
          "bed-conversion",
          `convertVcfToBed(${outputs.vcf})`,
          null,
          e.message
        )
      );
    }

    return StageResult.Completed([outputs.bed, outputs.snps, outputs.indels]);
  },
};
