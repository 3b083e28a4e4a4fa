export {
  DEFAULT_PLATFORM_POLICIES,
  buildPolicyTable,
  loadPolicyTable,
  resolvePolicy,
  parseSlot,
  formatSlot,
  type RawPlatformPolicy,
} from './policies.js';
export { TimeSelector, isWeekend, type TimeSelectorOptions, type SlotSelection } from './time-selector.js';
export { DrizzleTaskStore, decodeTags, encodeTags, type TaskStore } from './task-store.js';
export { MemoryTaskStore } from './memory-store.js';
export { PublishScheduler, parsePublishRequest } from './scheduler.js';
export { PublishWorker, type PublishWorkerOptions, type WorkerRunSummary } from './worker.js';
