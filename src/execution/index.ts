/**
 * Execution layer barrel export.
 */

export { createOutputCapture, trimPartialUtf8, type OutputCapture, type StreamName } from './output-capture.js';
export {
  createProcessExecutor,
  type ExecutionState,
  type Executor,
  type ProcessOutcome,
  type SpawnSpec,
  type TerminalState,
} from './process-executor.js';
export { createExecutionMetrics, type ExecutionMetrics } from './metrics.js';
export {
  SPAWN_FAILED_MESSAGE,
  classifyOutcome,
  createExecutionCoordinator,
  type CoordinatorContext,
  type ExecutionCoordinator,
} from './coordinator.js';
export { toWireRejection, toWireResult, type WireRejection, type WireResult } from './wire.js';
