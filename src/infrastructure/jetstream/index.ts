export {
  JetstreamAdapter,
  DEFAULT_JETSTREAM_SETTINGS,
  buildSubscribeUrl,
  backoffDelay,
  rawDataToString,
} from './jetstream-adapter.js';
export type {
  JetstreamSettings,
  JetstreamSocket,
  SocketFactory,
  JetstreamAdapterOptions,
} from './jetstream-adapter.js';
export { decodeJetstreamMessage } from './jetstream-decoder.js';
export { POST_COLLECTION } from './jetstream-schema.js';
