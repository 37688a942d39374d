import type { PipelineConfig } from "../pipeline-config";
import { PipelineContext, PipelineStage, runInvocations } from "../pipeline-stage";
import { StageResult } from "../stage-result";

/**
 * Leave a plain text copy of the VCF beside the gzipped one.
 */
export const decompressStage: PipelineStage = {
  name: "decompress",
  description: "gzip -d of the called VCF (keeping the original)",

  skipReason: (config: PipelineConfig) =>
    config.gunzip ? "gzipped output only requested" : undefined,

  async execute({ config, outputs, runner }: PipelineContext): Promise<StageResult> {
    // -f because preflight has already confirmed overwriting any existing VCF
    return runInvocations(
      runner,
      [{ stage: "decompress", binary: config.tools.gzip, args: ["-d", "-k", "-f", outputs.vcfGz] }],
      [outputs.vcf]
    );
  },
};
