import { env as processEnv } from "process";

// by default we expect every tool to be found on the PATH - HOWEVER, it is useful to be able to
// point at specific builds (gatk in particular is rarely installed anywhere standard)
// THESE PATHS ARE NOT CHECKED - they are handed directly to execFile

/**
 * The locations of every external binary the pipeline invokes.
 */
export type ToolPaths = {
  bwa: string;
  samtools: string;
  bcftools: string;
  java: string;
  // gatk 3.x is distributed as a jar and is always run via java -jar
  gatkJar: string;
  gzip: string;
};

export function toolPathsFromEnv(
  envDict: NodeJS.ProcessEnv = processEnv
): ToolPaths {
  return {
    bwa: envDict["BWA"] || "bwa",
    samtools: envDict["SAMTOOLS"] || "samtools",
    bcftools: envDict["BCFTOOLS"] || "bcftools",
    java: envDict["JAVA"] || "java",
    gatkJar: envDict["GATK_JAR"] || "GenomeAnalysisTK.jar",
    // note: not GZIP - gzip itself reads that variable as extra options
    gzip: envDict["GZIP_BINARY"] || "gzip",
  };
}

export function workRootFromEnv(
  envDict: NodeJS.ProcessEnv = processEnv
): string {
  return envDict["VARIANT_PIPELINE_WORK"] || "variant-pipeline-work";
}

// the read group bwa tags every alignment with - deliberately fixed (the escapes are literal - bwa expands them)
export const READ_GROUP = "@RG\\tID:foo\\tSM:bar\\tLB:library1";

// gatk 3 heap sizes for the two realignment walkers
export const TARGET_CREATOR_HEAP = "-Xmx2g";
export const INDEL_REALIGNER_HEAP = "-Xmx4g";

// what the operator must type at the overwrite prompt to abandon the run
export const DECLINE_OVERWRITE_ANSWER = "y";
