export { IngestionBridge } from './ingestion-bridge.js';
export type {
  AdapterNotice,
  StreamAdapter,
  DecodeResult,
  Decoder,
  BridgeExitReason,
  BridgeStats,
} from './types.js';
