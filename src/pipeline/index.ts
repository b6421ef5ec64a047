export {
  PipelineStage,
  PipelineDependencies,
  PipelineRunStatus,
  PipelineRunResult,
  computeWindow,
  runPipeline,
} from "./runPipeline";
export {
  PipelineRuntime,
  RunOptions,
  createPipelineRuntime,
  runConfiguredPipeline,
} from "./runtime";
