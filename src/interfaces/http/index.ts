export { default as pipelinePlugin } from './pipeline-plugin.js';
export type { PipelinePluginOptions } from './pipeline-plugin.js';
export { default as consumerRoutes } from './consumer-routes.js';
export { toConsumerBody } from './consumer-routes.js';
export type { ConsumerBody } from './consumer-routes.js';
export { default as activityRoutes } from './activity-routes.js';
export { default as pipelineRoutes } from './pipeline-routes.js';
