export { HandoffQueue } from './channel/index.js';
export { IngestionBridge } from './ingestion/index.js';
export type {
  AdapterNotice,
  StreamAdapter,
  DecodeResult,
  Decoder,
  BridgeExitReason,
  BridgeStats,
} from './ingestion/index.js';
export {
  JetstreamAdapter,
  DEFAULT_JETSTREAM_SETTINGS,
  decodeJetstreamMessage,
} from './jetstream/index.js';
export type { JetstreamSettings } from './jetstream/index.js';
export { loadPipelineConfig, DEFAULT_CONFIG } from './config/index.js';
export type { PipelineConfig } from './config/index.js';
