export { loadPipelineConfig, ConfigError } from './pipeline-config.js';
export type { PipelineConfig, PipelineEnv } from './pipeline-config.js';
