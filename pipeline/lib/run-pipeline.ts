import type { PipelineConfig } from "./pipeline-config";
import type { StageFailedError } from "./pipeline-errors";
import type { PipelineContext, PipelineStage } from "./pipeline-stage";
import { Confirm, preflight, terminalConfirm } from "./preflight";
import {
  createRunWorkspace,
  OutputArtifacts,
  outputArtifacts,
  removeRunWorkspace,
  RunWorkspace,
} from "./run-workspace";
import type { StageName, StageRecord, StageResult } from "./stage-result";
import { PIPELINE_STAGES } from "./stages";
import { ExecFileToolRunner, ToolRunner } from "./tool-runner";

export type PipelineOutcome =
  | { type: "declined" }
  | {
      type: "succeeded";
      workspace: RunWorkspace;
      outputs: OutputArtifacts;
      stages: StageRecord[];
      warnings: string[];
    }
  | {
      type: "failed";
      stage: StageName;
      error: StageFailedError;
      workspace: RunWorkspace;
      outputs: OutputArtifacts;
      stages: StageRecord[];
      warnings: string[];
    };

/**
 * The collaborators of a pipeline run - all default to the real thing.
 */
export type PipelineDependencies = {
  runner?: ToolRunner;
  confirm?: Confirm;
  stages?: readonly PipelineStage[];
  now?: () => Date;
};

function recordFor(
  name: StageName,
  result: StageResult,
  started: Date,
  finished: Date
): StageRecord {
  switch (result.type) {
    case "completed":
      return {
        name,
        status: "completed",
        started,
        finished,
        produced: result.produced,
        detail: "",
      };
    case "skipped":
      return {
        name,
        status: "skipped",
        started,
        finished,
        produced: [],
        detail: result.reason,
      };
    case "failed":
      return {
        name,
        status: "failed",
        started,
        finished,
        produced: [],
        detail: result.error.message,
      };
  }
}

/**
 * Run the variant calling pipeline for the given configuration. Stages are
 * run strictly in order and the first failing stage ends the run.
 *
 * @param config
 * @param deps
 */
export async function runPipeline(
  config: PipelineConfig,
  deps: PipelineDependencies = {}
): Promise<PipelineOutcome> {
  const now = deps.now ?? (() => new Date());

  // nothing is created on disk or invoked until preflight passes
  const checked = await preflight(config, deps.confirm ?? terminalConfirm);

  if (checked.type === "declined") return checked;

  const workspace = await createRunWorkspace(config.workRoot, now());
  const outputs = outputArtifacts(config.output);

  console.log(`Run ${workspace.runId} using workspace ${workspace.dir}`);

  const context: PipelineContext = {
    config,
    workspace,
    outputs,
    runner: deps.runner ?? new ExecFileToolRunner(config.verbose),
  };

  const records: StageRecord[] = [];

  for (const stage of deps.stages ?? PIPELINE_STAGES) {
    const started = now();
    const skipReason = stage.skipReason(config);

    let result: StageResult;

    if (skipReason !== undefined) {
      result = { type: "skipped", reason: skipReason };
    } else {
      console.log(`Starting stage ${stage.name}: ${stage.description}`);
      result = await stage.execute(context);
    }

    records.push(recordFor(stage.name, result, started, now()));

    if (result.type === "failed") {
      console.error(result.error.summary());

      return {
        type: "failed",
        stage: stage.name,
        error: result.error,
        workspace,
        outputs,
        stages: records,
        warnings: checked.warnings,
      };
    }
  }

  if (config.clean) await removeRunWorkspace(workspace);

  return {
    type: "succeeded",
    workspace,
    outputs,
    stages: records,
    warnings: checked.warnings,
  };
}
