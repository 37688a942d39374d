import { appendFile, readFile, writeFile } from "fs/promises";
import { basename } from "path";
import { gunzipSync, gzipSync } from "zlib";
import { StageFailedError } from "../lib/pipeline-errors";
import {
  formatCommand,
  ToolInvocation,
  ToolOutput,
  ToolRunner,
} from "../lib/tool-runner";
import { SAMPLE_VCF } from "./sample";

/**
 * A short name for an invocation e.g. "samtools sort" or "java IndelRealigner"
 */
export function commandName(invocation: ToolInvocation): string {
  const tool = basename(invocation.binary);

  if (tool === "java") {
    const walker = invocation.args[invocation.args.indexOf("-T") + 1];
    return `java ${walker}`;
  }

  return `${tool} ${invocation.args[0]}`;
}

function argAfter(args: string[], flag: string): string | undefined {
  const i = args.indexOf(flag);

  return i >= 0 ? args[i + 1] : undefined;
}

/**
 * Stands in for the real bioinformatics tools - records what it was asked
 * to run and creates (tiny) versions of the files each tool would have made.
 */
export class FakeToolRunner implements ToolRunner {
  readonly invocations: ToolInvocation[] = [];

  /**
   * @param failOn commands (as per commandName) that should exit 1 instead of running
   * @param vcfText the VCF content bcftools call will "produce"
   */
  constructor(
    private readonly failOn: string[] = [],
    private readonly vcfText: string = SAMPLE_VCF
  ) {}

  commands(): string[] {
    return this.invocations.map(commandName);
  }

  async run(invocation: ToolInvocation): Promise<ToolOutput> {
    this.invocations.push(invocation);

    const name = commandName(invocation);
    const stderr = `fake ${name} diagnostics\n`;

    if (invocation.stderrLog) {
      if (invocation.stderrLog.append)
        await appendFile(invocation.stderrLog.path, stderr);
      else await writeFile(invocation.stderrLog.path, stderr);
    }

    if (this.failOn.includes(name))
      throw new StageFailedError(
        invocation.stage,
        formatCommand(invocation.binary, invocation.args),
        1,
        `[${name}] simulated failure\n`
      );

    await this.produce(name, invocation.args);

    return { stdout: "", stderr };
  }

  private async produce(name: string, args: string[]) {
    const last = args[args.length - 1];

    switch (name) {
      case "samtools fixmate":
        await writeFile(last, "fixmate bam");
        return;
      case "samtools index":
        await writeFile(`${last}.bai`, "bai");
        return;
      case "samtools faidx":
        await writeFile(`${last}.fai`, "fai");
        return;
      case "bcftools call": {
        const out = argAfter(args, "-o");
        if (out) await writeFile(out, gzipSync(this.vcfText));
        return;
      }
      case "gzip -d": {
        const compressed = await readFile(last);
        await writeFile(last.replace(/\.gz$/, ""), gunzipSync(compressed));
        return;
      }
    }

    // everything else names its output with -o
    const out = argAfter(args, "-o");
    if (out) await writeFile(out, `${name} output`);
  }
}
