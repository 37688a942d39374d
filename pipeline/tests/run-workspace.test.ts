import { existsSync } from "fs";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import {
  createRunWorkspace,
  outputArtifacts,
  referenceDictPath,
  referenceFaiPath,
  removeRunWorkspace,
  workspaceFor,
} from "../lib/run-workspace";

describe("Run workspace", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "run-workspace-"));
    jest.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it("names every intermediate inside the run directory", () => {
    const ws = workspaceFor("/scratch", "run-1");

    expect(ws.dir).toBe("/scratch/run-1");
    expect(ws.sam).toBe("/scratch/run-1/lane.sam");
    expect(ws.fixmateBam).toBe("/scratch/run-1/lane_fixmate.bam");
    expect(ws.sortedBam).toBe("/scratch/run-1/lane_sorted.bam");
    expect(ws.intervals).toBe("/scratch/run-1/lane.intervals");
    expect(ws.realignedBam).toBe("/scratch/run-1/lane_realigned.bam");
    expect(ws.realignmentLog).toBe("/scratch/run-1/realignment.log");
  });

  it("creates a uniquely named directory per run", async () => {
    const when = new Date(2026, 9, 19, 8, 5, 3);

    const a = await createRunWorkspace(dir, when);
    const b = await createRunWorkspace(dir, when);

    expect(a.runId).toMatch(/^run-20261019-080503-[0-9a-f]{8}$/);
    expect(a.runId).not.toBe(b.runId);
    expect(existsSync(a.dir)).toBe(true);
    expect(existsSync(b.dir)).toBe(true);
  });

  it("removes a workspace and its content", async () => {
    const ws = await createRunWorkspace(dir);
    await writeFile(ws.sam, "@HD");

    await removeRunWorkspace(ws);

    expect(existsSync(ws.dir)).toBe(false);
  });

  it("derives the output names from the base name", () => {
    expect(outputArtifacts("results/sample1")).toEqual({
      vcfGz: "results/sample1.vcf.gz",
      vcf: "results/sample1.vcf",
      bed: "results/sample1.bed",
      snps: "results/sample1_snps.txt",
      indels: "results/sample1_indels.txt",
    });
  });

  it("swaps the reference extension for the dictionary", () => {
    expect(referenceDictPath("refs/hg38.fa")).toBe("refs/hg38.dict");
    expect(referenceDictPath("refs/hg38.fasta.gz")).toBe("refs/hg38.fasta.dict");
    expect(referenceDictPath("genome")).toBe("genome.dict");
    expect(referenceFaiPath("refs/hg38.fa")).toBe("refs/hg38.fa.fai");
  });
});
