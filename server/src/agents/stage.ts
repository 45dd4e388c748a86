import type { Logger } from '../lib/logger.js';
import type { AppError, PipelineStageName } from '../lib/errors.js';
import type { PipelineTools } from '../tools/types.js';
import type { GenerateInput, PipelineState, StageOutputKey, StageUpdate } from './types.js';

export interface PipelineSettings {
  imageConcurrency: number;
  maxImages: number;
  followUpAttempts: number;
}

/**
 * Everything a stage may touch during one run. Stages hold no state of their
 * own; the orchestrator builds a fresh context per stage.
 */
export interface StageContext {
  session_id: string;
  input: GenerateInput;
  tools: PipelineTools;
  settings: PipelineSettings;
  /** Aborted when the caller cancels the run. */
  signal: AbortSignal;
  log: Logger;
  /**
   * Invoke an external tool with retry on transient errors and a per-call
   * timeout. `fn` receives a signal that fires on timeout or cancellation.
   */
  callTool<T>(tool: string, fn: (signal: AbortSignal) => Promise<T>): Promise<T>;
  /** Record a non-fatal failure as a `degraded` session event. */
  recordDegradation(error: AppError, data?: Record<string, unknown>): Promise<void>;
}

export interface PipelineStage<K extends StageOutputKey = StageOutputKey> {
  readonly name: PipelineStageName;
  /** State keys that must be present before the stage runs. */
  readonly inputKeys: readonly (keyof PipelineState)[];
  readonly outputKey: K;
  execute(state: PipelineState, ctx: StageContext): Promise<Extract<StageUpdate, { key: K }>>;
}
