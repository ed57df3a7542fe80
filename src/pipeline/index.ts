export type { NextPolicy, PipelinePolicy } from "./policy.js";
export { Pipeline } from "./pipeline.js";
export { createPipeline, type PipelineOptions } from "./create-pipeline.js";
