import { promisify } from "util";
import { execFile } from "child_process";
import { appendFile, writeFile } from "fs/promises";
import { StageFailedError } from "./pipeline-errors";
import type { StageName } from "./stage-result";

// get this functionality as promise compatible function
const execFilePromise = promisify(execFile);

/**
 * A single external command that a stage wants run.
 */
export type ToolInvocation = {
  stage: StageName;
  binary: string;
  args: string[];

  // if present, the tool's stderr goes to this file instead of our console
  stderrLog?: { path: string; append: boolean };
};

export type ToolOutput = {
  stdout: string;
  stderr: string;
};

/**
 * Anything that can run a tool invocation to completion. Must reject with
 * a StageFailedError if the tool did not succeed.
 */
export interface ToolRunner {
  run(invocation: ToolInvocation): Promise<ToolOutput>;
}

/**
 * Render a command line in a form that could be pasted back into a shell.
 */
export function formatCommand(binary: string, args: string[]): string {
  return [binary, ...args]
    .map((a) => (/^[\w@%+=:,./-]+$/.test(a) ? a : `'${a.replaceAll("'", "'\\''")}'`))
    .join(" ");
}

function describeExecFailure(e: unknown): {
  exitCode: number | string | null;
  stderr: string;
} {
  if (e instanceof Error) {
    const code = "code" in e ? e.code : undefined;
    const stderr = "stderr" in e ? e.stderr : undefined;

    return {
      exitCode: typeof code === "number" || typeof code === "string" ? code : null,
      // a failure to even spawn (ENOENT etc) has no stderr - so fall back to the node message
      stderr: typeof stderr === "string" && stderr.length > 0 ? stderr : e.message,
    };
  }

  return { exitCode: null, stderr: String(e) };
}

function logLines(prefix: string, text: string) {
  if (text) {
    text.split("\n").forEach((l) => console.log(`${prefix} ${l}`));
  }
}

async function saveStderr(invocation: ToolInvocation, stderr: string) {
  if (!invocation.stderrLog) {
    logLines("stderr", stderr);
    return;
  }

  if (invocation.stderrLog.append)
    await appendFile(invocation.stderrLog.path, stderr);
  else await writeFile(invocation.stderrLog.path, stderr);
}

/**
 * Runs tools as real subprocesses via execFile (no shell is involved - every
 * argument goes to the tool exactly as given).
 */
export class ExecFileToolRunner implements ToolRunner {
  constructor(private readonly verbose: boolean) {}

  async run(invocation: ToolInvocation): Promise<ToolOutput> {
    const command = formatCommand(invocation.binary, invocation.args);

    if (this.verbose) console.log(`+ ${command}`);

    let output: ToolOutput;

    try {
      output = await execFilePromise(invocation.binary, invocation.args, {
        // bwa and gatk can produce a lot of progress chatter on stderr
        maxBuffer: 1024 * 1024 * 64,
      });
    } catch (e) {
      const { exitCode, stderr } = describeExecFailure(e);

      await saveStderr(invocation, stderr);

      throw new StageFailedError(invocation.stage, command, exitCode, stderr);
    }

    logLines("stdout", output.stdout);
    await saveStderr(invocation, output.stderr);

    return output;
  }
}
