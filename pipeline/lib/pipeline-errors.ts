import type { StageName } from "./stage-result";

/**
 * Raised when the combination of command line options can never produce
 * a sensible run (e.g. indexing a realigned BAM that realignment won't create).
 */
export class PipelineConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PipelineConfigError";
  }
}

/**
 * Raised before any tool has been invoked when a mandatory input
 * file is not present.
 */
export class PreflightError extends Error {
  constructor(
    message: string,
    public readonly role: "reads1" | "ref",
    public readonly path: string | undefined
  ) {
    super(message);
    this.name = "PreflightError";
  }
}

/**
 * An external tool exited non-zero (or could not be started at all). Carries
 * enough to tell the operator exactly which command in which stage broke.
 */
export class StageFailedError extends Error {
  constructor(
    public readonly stage: StageName,
    public readonly command: string,
    public readonly exitCode: number | string | null,
    public readonly stderr: string
  ) {
    super(
      `Stage '${stage}' failed running '${command}' (exit code ${
        exitCode ?? "unknown"
      })`
    );
    this.name = "StageFailedError";
  }

  /**
   * The message plus the tail of the tool's stderr - tools like bwa and gatk
   * are chatty so the useful bit is almost always at the end.
   */
  summary(maxStderrLines: number = 10): string {
    const lines = this.stderr
      .split("\n")
      .map((l) => l.trimEnd())
      .filter((l) => l.length > 0);

    if (lines.length === 0) return this.message;

    return [this.message, ...lines.slice(-maxStderrLines).map((l) => `  ${l}`)].join(
      "\n"
    );
  }
}
