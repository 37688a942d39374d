import {
  buildPipelineConfig,
  PipelineOptions,
} from "../pipeline/lib/pipeline-config";
import {
  PipelineConfigError,
  PreflightError,
} from "../pipeline/lib/pipeline-errors";
import { reportStages } from "../pipeline/lib/report-run";
import {
  PipelineDependencies,
  runPipeline,
} from "../pipeline/lib/run-pipeline";

/**
 * Run the pipeline from parsed command line options and report on it.
 *
 * @param options
 * @param deps
 * @param envDict
 * @return the process exit code
 */
export async function runCommand(
  options: PipelineOptions,
  deps: PipelineDependencies = {},
  envDict: NodeJS.ProcessEnv = process.env
): Promise<number> {
  try {
    const config = buildPipelineConfig(options, envDict);

    const outcome = await runPipeline(config, deps);

    switch (outcome.type) {
      case "declined":
        return 0;

      case "succeeded":
        console.log(reportStages(outcome.stages));
        console.log(
          `Variants written to ${outcome.outputs.vcfGz}${
            config.gunzip ? "" : ` and ${outcome.outputs.vcf}`
          }`
        );
        return 0;

      case "failed":
        console.log(reportStages(outcome.stages));
        console.error(
          `Pipeline stopped at stage '${outcome.stage}' - intermediate files left in ${outcome.workspace.dir}`
        );
        return 1;
    }
  } catch (e) {
    if (e instanceof PipelineConfigError || e instanceof PreflightError) {
      console.error(e.message);
      return 1;
    }

    throw e;
  }
}
