import { join, parse } from "path";
import { mkdir, rm } from "fs/promises";
import * as crypto from "node:crypto";
import { format } from "date-fns";

/**
 * The per-run directory holding every intermediate artifact, along with the
 * (fixed within the directory) names of those artifacts.
 */
export type RunWorkspace = {
  runId: string;
  dir: string;
  sam: string;
  fixmateBam: string;
  sortedBam: string;
  sortTempPrefix: string;
  intervals: string;
  realignedBam: string;
  pileup: string;
  realignmentLog: string;
};

export type OutputArtifacts = {
  vcfGz: string;
  vcf: string;
  bed: string;
  snps: string;
  indels: string;
};

export function workspaceFor(workRoot: string, runId: string): RunWorkspace {
  const dir = join(workRoot, runId);

  return {
    runId,
    dir,
    sam: join(dir, "lane.sam"),
    fixmateBam: join(dir, "lane_fixmate.bam"),
    sortedBam: join(dir, "lane_sorted.bam"),
    sortTempPrefix: join(dir, "lane_temp"),
    intervals: join(dir, "lane.intervals"),
    realignedBam: join(dir, "lane_realigned.bam"),
    pileup: join(dir, "lane.pileup.bcf"),
    realignmentLog: join(dir, "realignment.log"),
  };
}

/**
 * Create a fresh workspace directory. Each run gets its own so that two
 * pipelines started in the same directory never touch each other's BAMs.
 */
export async function createRunWorkspace(
  workRoot: string,
  now: Date = new Date()
): Promise<RunWorkspace> {
  const randomString = crypto.randomBytes(4).toString("hex");
  const runId = `run-${format(now, "yyyyMMdd-HHmmss")}-${randomString}`;

  const workspace = workspaceFor(workRoot, runId);

  await mkdir(workspace.dir, { recursive: true });

  return workspace;
}

export async function removeRunWorkspace(workspace: RunWorkspace) {
  console.log(`Removing ${workspace.dir}`);

  await rm(workspace.dir, { recursive: true, force: true });
}

export function outputArtifacts(output: string): OutputArtifacts {
  return {
    vcfGz: `${output}.vcf.gz`,
    vcf: `${output}.vcf`,
    bed: `${output}.bed`,
    snps: `${output}_snps.txt`,
    indels: `${output}_indels.txt`,
  };
}

/**
 * The sequence dictionary gatk insists on finding beside the reference,
 * named by swapping the reference's (last) extension for .dict
 *
 * @param ref the reference FASTA path e.g. refs/hg38.fa -> refs/hg38.dict
 */
export function referenceDictPath(ref: string): string {
  const p = parse(ref);

  return join(p.dir, `${p.name}.dict`);
}

export function referenceFaiPath(ref: string): string {
  return `${ref}.fai`;
}
