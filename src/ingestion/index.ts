/**
 * Ingestion module barrel exports
 */

export {
  startRun,
  finishRun,
  withRun,
  createRunAccumulator,
} from "./runLifecycle";

export { Deduplicator } from "./deduplicator";

export { processPostingBatch } from "./processPostingBatch";

export { runCollection } from "./runCollection";
