import { env as processEnv } from "process";
import {
  ToolPaths,
  toolPathsFromEnv,
  workRootFromEnv,
} from "./environment-constants";
import { PipelineConfigError } from "./pipeline-errors";

/**
 * The raw options as they come off the command line - everything optional
 * because commander gives us exactly what the user typed.
 */
export type PipelineOptions = {
  reads1?: string;
  reads2?: string;
  ref?: string;
  output?: string;
  millsFile?: string;
  realign?: boolean;
  gunzip?: boolean;
  index?: boolean;
  verbose?: boolean;
  force?: boolean;
  bed?: boolean;
  clean?: boolean;
  workDir?: string;
};

/**
 * The settings for a single pipeline run. Constructed once, frozen, and then
 * handed to every stage.
 *
 * Note that reads1 and ref are allowed to be undefined here - a missing mandatory
 * input file is a preflight problem (reported the same way whether the flag was
 * left off or points at nothing) rather than a configuration problem.
 */
export type PipelineConfig = Readonly<{
  reads1: string | undefined;
  reads2: string | undefined;
  ref: string | undefined;
  output: string;
  millsFile: string | undefined;
  realign: boolean;
  gunzip: boolean;
  index: boolean;
  verbose: boolean;
  force: boolean;
  bed: boolean;
  clean: boolean;
  workRoot: string;
  tools: Readonly<ToolPaths>;
}>;

export function buildPipelineConfig(
  options: PipelineOptions,
  envDict: NodeJS.ProcessEnv = processEnv
): PipelineConfig {
  const realign = options.realign ?? false;
  const index = options.index ?? false;
  const gunzip = options.gunzip ?? false;
  const bed = options.bed ?? false;

  const output = options.output?.trim() ?? "";

  if (output.length === 0)
    throw new PipelineConfigError(
      "An output VCF base name (without extension) must be given with -o"
    );

  if (index && !realign)
    throw new PipelineConfigError(
      "Indexing (-i) applies to the realigned BAM so can only be requested along with realignment (-e)"
    );

  if (realign && !options.millsFile)
    throw new PipelineConfigError(
      "Realignment (-e) requires a known indels (Mills) file given with -f"
    );

  if (bed && gunzip)
    throw new PipelineConfigError(
      "BED conversion (--bed) reads the uncompressed VCF so cannot be combined with keeping only the gzipped output (-z)"
    );

  return Object.freeze({
    reads1: options.reads1,
    reads2: options.reads2,
    ref: options.ref,
    output,
    millsFile: options.millsFile,
    realign,
    gunzip,
    index,
    verbose: options.verbose ?? false,
    force: options.force ?? false,
    bed,
    clean: options.clean ?? false,
    workRoot: options.workDir || workRootFromEnv(envDict),
    tools: Object.freeze(toolPathsFromEnv(envDict)),
  });
}
