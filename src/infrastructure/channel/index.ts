export { HandoffQueue } from './handoff-queue.js';
