import { Command } from "commander";
import type { PipelineOptions } from "../pipeline/lib/pipeline-config";

const PREREQUISITES = `
Prerequisites (on the PATH, or pointed to by the environment variable shown):
  bwa                            BWA
  samtools                       SAMTOOLS
  bcftools                       BCFTOOLS
  java 1.8 (for gatk 3.x)        JAVA
  GenomeAnalysisTK.jar (3.7.0)   GATK_JAR
  gzip                           GZIP_BINARY

Realignment also needs a known indels VCF (e.g. Mills and 1000G gold standard indels
for the matching genome build) given with -f.

Intermediate files are written to a fresh directory per run under --work-dir
(or VARIANT_PIPELINE_WORK, default ./variant-pipeline-work).
`;

/**
 * The command line definition. The action is passed in so the parsing can
 * be exercised without running anything.
 *
 * @param run what to do with the parsed options
 */
export function buildProgram(
  run: (options: PipelineOptions) => Promise<void>
): Command {
  const program = new Command();

  program
    .name("variant-pipeline")
    .description(
      "Align paired-end reads, optionally realign around known indels, and call variants"
    )
    .version("1.0.0", "-V, --version")
    .option("-a, --reads1 <path>", "input reads file - pair 1")
    .option("-b, --reads2 <path>", "input reads file - pair 2")
    .option("-r, --ref <path>", "reference genome file")
    .option("-e, --realign", "perform read re-alignment")
    .option("-o, --output <name>", "output VCF file name (without extension)")
    .option("-f, --mills-file <path>", "Mills (known indels) file location")
    .option("-z, --gunzip", "output VCF should stay gunzipped (*.vcf.gz) only")
    .option("-v, --verbose", "print each command before it is run")
    .option("-i, --index", "index the realigned BAM file (using samtools index)")
    .option("--force", "overwrite an existing output VCF without asking")
    .option("--bed", "also write BED, SNP and indel tables from the output VCF")
    .option("--work-dir <dir>", "directory under which each run's workspace is made")
    .option("--clean", "remove the run workspace after a successful run")
    .addHelpText("after", PREREQUISITES)
    .action(async (options: PipelineOptions) => {
      await run(options);
    });

  return program;
}
