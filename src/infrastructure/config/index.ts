export { loadPipelineConfig, parseSimpleYaml, DEFAULT_CONFIG } from './pipeline-config.js';
export type { PipelineConfig } from './pipeline-config.js';
