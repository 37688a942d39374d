import type { PipelineConfig } from "./pipeline-config";
import { StageFailedError } from "./pipeline-errors";
import type { OutputArtifacts, RunWorkspace } from "./run-workspace";
import { StageName, StageResult } from "./stage-result";
import type { ToolInvocation, ToolRunner } from "./tool-runner";

/**
 * Everything a stage can see. Stages never communicate with each other
 * except via the artifact paths named here.
 */
export type PipelineContext = {
  config: PipelineConfig;
  workspace: RunWorkspace;
  outputs: OutputArtifacts;
  runner: ToolRunner;
};

/**
 * A single step of the variant calling pipeline.
 */
export interface PipelineStage {
  name: StageName;

  description: string;

  /**
   * If the stage should not run for this configuration, the reason why.
   */
  skipReason(config: PipelineConfig): string | undefined;

  /**
   * Run the stage. Tool failures come back as a failed result - only
   * unexpected problems are thrown.
   */
  execute(context: PipelineContext): Promise<StageResult>;
}

/**
 * Run the given invocations one after the other, stopping at the first
 * that fails.
 *
 * @param runner
 * @param invocations
 * @param produced the artifacts the stage will have created if all invocations succeed
 */
export async function runInvocations(
  runner: ToolRunner,
  invocations: ToolInvocation[],
  produced: string[]
): Promise<StageResult> {
  for (const invocation of invocations) {
    try {
      await runner.run(invocation);
    } catch (e) {
      if (e instanceof StageFailedError) return StageResult.Failed(e);

      throw e;
    }
  }

  return StageResult.Completed(produced);
}
