export { default as pipelinePlugin } from './pipeline-plugin.js';
export type { PipelinePluginOptions } from './pipeline-plugin.js';
export { default as logRoutes } from './log-routes.js';
