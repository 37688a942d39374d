import { existsSync } from "fs";
import { createInterface } from "readline/promises";
import { stdin, stdout } from "process";
import type { PipelineConfig } from "./pipeline-config";
import { PreflightError } from "./pipeline-errors";
import { outputArtifacts } from "./run-workspace";
import { DECLINE_OVERWRITE_ANSWER } from "./environment-constants";

/**
 * Asks the operator a question and resolves to whatever they typed.
 */
export type Confirm = (question: string) => Promise<string>;

export type PreflightOutcome =
  | { type: "proceed"; warnings: string[] }
  | { type: "declined" };

/**
 * Ask on the terminal. If input ends before a line arrives (stdin from /dev/null,
 * a closed pipe) that counts as an empty answer.
 *
 * @param question
 * @param input
 * @param output
 */
export async function terminalConfirm(
  question: string,
  input: NodeJS.ReadableStream = stdin,
  output: NodeJS.WritableStream = stdout
): Promise<string> {
  const rl = createInterface({ input, output });

  let closed = false;

  try {
    return await new Promise<string>((resolve, reject) => {
      rl.once("close", () => {
        closed = true;
        resolve("");
      });
      rl.question(question).then(resolve, reject);
    });
  } finally {
    if (!closed) rl.close();
  }
}

/**
 * Check the input files exist and that we aren't about to silently clobber
 * a previous result. Runs before anything is invoked or created on disk.
 *
 * @param config
 * @param confirm how to ask about overwriting an existing output
 */
export async function preflight(
  config: PipelineConfig,
  confirm: Confirm
): Promise<PreflightOutcome> {
  const warnings: string[] = [];

  if (!config.reads1 || !existsSync(config.reads1))
    throw new PreflightError(
      `1st reads file is missing (${config.reads1 ?? "not given"})`,
      "reads1",
      config.reads1
    );

  // a second reads file is not strictly mandatory - without one bwa does a single-ended alignment,
  // and a named-but-absent file will make the aligner fail (which we report then)
  if (!config.reads2 || !existsSync(config.reads2)) {
    const w = `2nd reads file is missing (${config.reads2 ?? "not given"})`;
    console.warn(w);
    warnings.push(w);
  }

  if (!config.ref || !existsSync(config.ref))
    throw new PreflightError(
      `Reference genome file is missing (${config.ref ?? "not given"})`,
      "ref",
      config.ref
    );

  const outputs = outputArtifacts(config.output);

  if (!config.force && (existsSync(outputs.vcf) || existsSync(outputs.vcfGz))) {
    const answer = await confirm(
      `Output VCF file already exists. Enter ${DECLINE_OVERWRITE_ANSWER} to exit the program. To overwrite the existing file please enter anything except ${DECLINE_OVERWRITE_ANSWER}. `
    );

    if (answer.trim() === DECLINE_OVERWRITE_ANSWER) {
      console.log("Exiting");
      return { type: "declined" };
    }

    console.log("Continuing");
  }

  return { type: "proceed", warnings };
}
