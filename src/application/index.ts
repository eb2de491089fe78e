export { ArrivalBuffer } from './arrival-buffer.js';
export { RetentionBuffer, DEFAULT_RETENTION_CAPACITY } from './retention-buffer.js';
export { FlowControlGate, DEFAULT_SCROLL_COOLDOWN_MS } from './flow-control-gate.js';
export {
  ConsumerRegistry,
  PRIMARY_CONSUMER_ID,
  matchesKeyword,
} from './consumer-registry.js';
export type {
  ConsumerView,
  RoutableConsumer,
  ConsumerRole,
  RemoveResult,
  ConsumerRegistryOptions,
} from './consumer-registry.js';
export { routeBatch } from './fanout-router.js';
export type { RouteReport, ConsumerDelivery } from './fanout-router.js';
export { DispatchScheduler, DEFAULT_DISPATCH_INTERVAL_MS } from './dispatch-scheduler.js';
export type { DispatchOutcome, DispatchListener, DispatchSchedulerOptions } from './dispatch-scheduler.js';
export { Pipeline, DEFAULT_PIPELINE_SETTINGS } from './pipeline.js';
export type { PipelineState, PipelineSettings, PipelineOptions, PipelineHealth } from './pipeline.js';
export { summarizePost, countFacets, shortAuthorLabel } from './post-summary.js';
export type { PostSummary, FacetCounts } from './post-summary.js';
export { createConsumerSchema, updateFilterSchema } from './consumer-schema.js';
export type { CreateConsumerInput, UpdateFilterInput } from './consumer-schema.js';
