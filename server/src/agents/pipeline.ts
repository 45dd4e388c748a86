/**
 * Pipeline orchestrator runs the four stages in fixed order against one
 * session, writes each stage's output before the next one starts, and turns
 * the copywriting output into exactly one post per listing image.
 *
 * State lives in the session store, never in the orchestrator: every stage
 * sees a freshly loaded, schema-checked snapshot. A session has at most one
 * active run in this process.
 */

import type { AppConfig } from '../lib/config.js';
import {
  AppError,
  GenerationError,
  NormalizationError,
  PipelineError,
  ToolTimeoutError,
  errorMessage,
  toPublicError,
} from '../lib/errors.js';
import type { PipelineStageName } from '../lib/errors.js';
import { startUsageTracking, stopUsageTracking } from '../lib/llm-provider.js';
import { getCopywriterModel } from '../lib/llm.js';
import { createSessionLogger } from '../lib/logger.js';
import type { Logger } from '../lib/logger.js';
import { isTransient, withRetry } from '../lib/retry.js';
import { withSessionLock } from '../lib/session-lock.js';
import { createCombinedAbortSignal, withTimeout } from '../lib/timeout.js';
import type { NewSessionEvent, SessionStore } from '../sessions/types.js';
import type { PipelineTools } from '../tools/types.js';
import { CopywritingStage } from './copywriter.js';
import type { CopywritingOptions } from './copywriter.js';
import { ImageAnalysisStage } from './image-analysis.js';
import { ListingScrapeStage } from './listing-scrape.js';
import { normalizePosts } from './normalizer.js';
import { fillSlots, reconcilePosts } from './reconcile.js';
import { PipelineStateSchema } from './schemas/state-schemas.js';
import { SiteEnrichmentStage } from './site-enrichment.js';
import type { PipelineSettings, PipelineStage, StageContext } from './stage.js';
import type {
  CopywritingOutput,
  GenerateInput,
  GenerateResult,
  PipelineState,
  Post,
  StageUpdate,
} from './types.js';

const MAX_RAW_EVENT_CHARS = 20_000;

export interface ToolCallPolicy {
  timeoutMs: number;
  maxAttempts: number;
  retryBaseDelayMs: number;
}

export interface PipelineOrchestratorDeps {
  store: SessionStore;
  tools: PipelineTools;
  settings: PipelineSettings;
  toolPolicy: ToolCallPolicy;
  copywriting?: CopywritingOptions;
}

export interface RunOptions {
  /** Aborting stops the run; nothing more is written to the session afterwards. */
  signal?: AbortSignal;
}

interface RunHandle {
  sessionId: string;
  input: GenerateInput;
  signal: AbortSignal;
  log: Logger;
  resume: boolean;
}

function cancelledError(stage: PipelineStageName | 'session'): PipelineError {
  return new PipelineError(stage, 'cancelled', `Run cancelled during ${stage}`);
}

/**
 * Timeouts and cancellation are final. Tool errors that wrap a transient
 * cause (rate limit, 5xx, connection reset) are retried.
 */
function isRetryableToolError(error: Error, raw: unknown): boolean {
  if (raw instanceof AppError) {
    if (raw.category === 'timeout' || raw.category === 'cancelled') return false;
    return raw.cause instanceof Error ? isTransient(raw.cause, raw.cause) : false;
  }
  return isTransient(error, raw);
}

export class PipelineOrchestrator {
  private readonly copywriter: CopywritingStage;
  readonly stages: readonly PipelineStage[];

  constructor(private readonly deps: PipelineOrchestratorDeps) {
    this.copywriter = new CopywritingStage(deps.copywriting);
    this.stages = [
      new ListingScrapeStage(),
      new SiteEnrichmentStage(),
      new ImageAnalysisStage(),
      this.copywriter,
    ];
  }

  /**
   * Run the full pipeline in a fresh session. Resolves to one post per listing
   * image, in listing order; rejects with PipelineError.
   */
  async run(input: GenerateInput, options: RunOptions = {}): Promise<Post[]> {
    const sessionId = await this.createRunSession(input, options.signal);
    return this.execute(sessionId, input, options, false);
  }

  /** Re-run only the stages whose output is missing from a stored session. */
  async resume(sessionId: string, options: RunOptions = {}): Promise<Post[]> {
    let state: PipelineState;
    try {
      state = await this.loadState(sessionId);
    } catch (err) {
      throw PipelineError.from('session', err);
    }
    if (state.final_posts) return state.final_posts;
    if (!state.input) {
      throw new PipelineError('session', 'internal', `Session ${sessionId} has no recorded input to resume from`);
    }
    return this.execute(sessionId, state.input, options, true);
  }

  /**
   * Caller-facing entry point. Never throws: failures come back as a public
   * error naming the stage and category, with a fixed message.
   */
  async generate(listingUrl: string, siteUrl: string | null, options: RunOptions = {}): Promise<GenerateResult> {
    const input: GenerateInput = { listing_url: listingUrl.trim(), site_url: siteUrl?.trim() || null };
    let sessionId: string | null = null;
    try {
      sessionId = await this.createRunSession(input, options.signal);
      const posts = await this.execute(sessionId, input, options, false);
      return { status: 'success', session_id: sessionId, posts };
    } catch (err) {
      const error = PipelineError.from('session', err);
      return { status: 'error', session_id: sessionId, error: toPublicError(error) };
    }
  }

  private async createRunSession(input: GenerateInput, signal?: AbortSignal): Promise<string> {
    if (signal?.aborted) throw cancelledError('session');
    try {
      return await this.deps.store.createSession({ initial_state: { input } });
    } catch (err) {
      throw PipelineError.from('session', err);
    }
  }

  private async loadState(sessionId: string): Promise<PipelineState> {
    const raw = await this.deps.store.getState(sessionId);
    const parsed = PipelineStateSchema.safeParse(raw);
    if (!parsed.success) {
      throw new AppError('internal', `Stored state for ${sessionId} failed validation`, { cause: parsed.error });
    }
    return parsed.data;
  }

  private async execute(sessionId: string, input: GenerateInput, options: RunOptions, resume: boolean): Promise<Post[]> {
    try {
      return await withSessionLock(sessionId, () => this.executeLocked({
        sessionId,
        input,
        signal: options.signal ?? new AbortController().signal,
        log: createSessionLogger(sessionId),
        resume,
      }));
    } catch (err) {
      throw PipelineError.from('session', err);
    }
  }

  private async executeLocked(run: RunHandle): Promise<Post[]> {
    const { sessionId, log } = run;
    const usage = startUsageTracking(sessionId);
    const startedAt = Date.now();
    let current: PipelineStageName | 'session' = 'session';
    let posts: Post[] | undefined;

    try {
      for (const stage of this.stages) {
        const state = await this.loadState(sessionId);
        if (run.resume && state[stage.outputKey] !== undefined) {
          log.info({ stage: stage.name }, 'Stage output already stored, skipping');
          continue;
        }

        current = stage.name;
        for (const key of stage.inputKeys) {
          if (state[key] === undefined) {
            throw new AppError('internal', `${stage.name} requires ${key}, which no earlier stage wrote`);
          }
        }

        const stageStartedAt = Date.now();
        await this.appendEvent(run, stage.name, { type: 'stage_start', stage: stage.name });
        const ctx = this.createContext(run, stage.name);

        const update = await stage.execute(state, ctx);
        if (run.signal.aborted) throw cancelledError(stage.name);
        if (update.key !== stage.outputKey) {
          throw new AppError('internal', `${stage.name} returned ${update.key} instead of ${stage.outputKey}`);
        }

        const written = await this.applyUpdate(run, stage.name, state, update, ctx);
        if (written) posts = written;
        await this.appendEvent(run, stage.name, {
          type: 'stage_complete',
          stage: stage.name,
          data: { duration_ms: Date.now() - stageStartedAt },
        });
        log.info({ stage: stage.name, duration_ms: Date.now() - stageStartedAt }, 'Stage complete');
      }

      current = 'session';
      const final = posts ?? (await this.loadState(sessionId)).final_posts;
      if (!final) {
        throw new AppError('internal', `Session ${sessionId} finished without final_posts`);
      }

      await this.appendEvent(run, 'session', {
        type: 'run_complete',
        data: {
          post_count: final.length,
          duration_ms: Date.now() - startedAt,
          usage: { input_tokens: usage.input_tokens, output_tokens: usage.output_tokens },
        },
      });
      log.info({
        post_count: final.length,
        duration_ms: Date.now() - startedAt,
        input_tokens: usage.input_tokens,
        output_tokens: usage.output_tokens,
      }, 'Pipeline complete');
      return final;
    } catch (err) {
      const error = run.signal.aborted ? cancelledError(current) : PipelineError.from(current, err);
      log.error({ stage: error.stage, category: error.category, error: errorMessage(err) }, 'Pipeline error');
      if (!run.signal.aborted) await this.recordFailure(run, error);
      throw error;
    } finally {
      stopUsageTracking(sessionId);
    }
  }

  /** Writes the stage's update; returns the posts when the update was the copywriting output. */
  private async applyUpdate(
    run: RunHandle,
    stage: PipelineStageName,
    state: PipelineState,
    update: StageUpdate,
    ctx: StageContext,
  ): Promise<Post[] | null> {
    switch (update.key) {
      case 'booking_data':
      case 'website_data':
        await this.write(run, stage, () => this.deps.store.mutateState(run.sessionId, update.key, update.value));
        return null;
      case 'analyzed_images': {
        const expected = state.booking_data?.image_urls ?? [];
        const aligned = update.value.length === expected.length
          && update.value.every((image, i) => image.image_url === expected[i]);
        if (!aligned) {
          throw new AppError('internal', 'analyzed_images does not line up with booking_data.image_urls');
        }
        await this.write(run, stage, () => this.deps.store.mutateState(run.sessionId, 'analyzed_images', update.value));
        return null;
      }
      case 'final_posts': {
        await this.recordRaw(run, update.value, 0);
        const posts = await this.finalizePosts(run, state, update.value, ctx);
        await this.write(run, stage, () => this.deps.store.mutateState(run.sessionId, 'final_posts', posts));
        return posts;
      }
    }
  }

  /**
   * Normalize the raw copy and give every image exactly one post. Images left
   * without one get follow-up copywriting calls; if any are still empty after
   * that, the run fails rather than return a short list.
   */
  private async finalizePosts(
    run: RunHandle,
    state: PipelineState,
    output: CopywritingOutput,
    ctx: StageContext,
  ): Promise<Post[]> {
    const images = state.analyzed_images ?? [];
    let result = reconcilePosts(normalizePosts(output.raw), images);
    if (result.dropped > 0) {
      run.log.warn({ dropped: result.dropped }, 'Dropped posts that matched no image');
    }

    for (let attempt = 1; result.missing.length > 0 && attempt <= this.deps.settings.followUpAttempts; attempt++) {
      run.log.warn({ missing: result.missing.length, attempt }, 'Copy missing for some images, requesting follow-up');
      const followUp = await this.copywriter.draft(state, result.missing, ctx);
      await this.recordRaw(run, followUp, attempt);

      let extra: Post[] = [];
      try {
        extra = normalizePosts(followUp.raw);
      } catch (err) {
        if (!(err instanceof NormalizationError)) throw err;
        run.log.warn({ attempt, error: err.message }, 'Follow-up copy was not usable');
      }
      result = fillSlots(result.slots, extra, images);
    }

    if (result.missing.length > 0) {
      throw new GenerationError(
        `No usable post for ${result.missing.length} of ${images.length} images`,
      );
    }
    return result.slots.filter((post): post is Post => post !== null);
  }

  private async recordRaw(run: RunHandle, output: CopywritingOutput, followUp: number): Promise<void> {
    await this.appendEvent(run, 'copywriting', {
      type: 'copywriting_raw',
      stage: 'copywriting',
      data: {
        model: output.model,
        follow_up: followUp,
        raw: output.raw.slice(0, MAX_RAW_EVENT_CHARS),
        truncated: output.raw.length > MAX_RAW_EVENT_CHARS,
      },
    });
  }

  private async recordFailure(run: RunHandle, error: PipelineError): Promise<void> {
    const data = { category: error.category, message: error.message };
    try {
      if (error.stage !== 'session') {
        await this.deps.store.appendEvent(run.sessionId, { type: 'stage_failed', stage: error.stage, data });
      }
      await this.deps.store.appendEvent(run.sessionId, { type: 'run_failed', data: { ...data, stage: error.stage } });
    } catch (recordErr) {
      run.log.warn({ error: errorMessage(recordErr) }, 'Could not record run failure in session');
    }
  }

  /**
   * Every store write for a run goes through here so that nothing is written
   * once the run's signal has fired.
   */
  private async write(run: RunHandle, stage: PipelineStageName | 'session', mutation: () => Promise<void>): Promise<void> {
    if (run.signal.aborted) throw cancelledError(stage);
    await mutation();
  }

  private appendEvent(run: RunHandle, stage: PipelineStageName | 'session', event: NewSessionEvent): Promise<void> {
    return this.write(run, stage, () => this.deps.store.appendEvent(run.sessionId, event));
  }

  private createContext(run: RunHandle, stage: PipelineStageName): StageContext {
    const { timeoutMs, maxAttempts, retryBaseDelayMs } = this.deps.toolPolicy;
    const log = run.log.child({ stage });
    const runSignal = run.signal;

    const callTool = async <T>(tool: string, fn: (signal: AbortSignal) => Promise<T>): Promise<T> => {
      if (runSignal.aborted) throw new AppError('cancelled', `${tool} call skipped, run cancelled`);
      try {
        return await withRetry(async () => {
          const attempt = createCombinedAbortSignal(runSignal);
          try {
            return await withTimeout(fn(attempt.signal), timeoutMs, tool, () =>
              attempt.abort(new ToolTimeoutError(tool, timeoutMs)),
            );
          } finally {
            attempt.cleanup();
          }
        }, {
          maxAttempts,
          baseDelay: retryBaseDelayMs,
          signal: runSignal,
          isRetryable: isRetryableToolError,
          onRetry: (attempt, error) => log.warn({ tool, attempt, error: error.message }, 'Tool call retry'),
        });
      } catch (err) {
        if (runSignal.aborted) throw new AppError('cancelled', `${tool} call cancelled`, { cause: err });
        throw err;
      }
    };

    return {
      session_id: run.sessionId,
      input: run.input,
      tools: this.deps.tools,
      settings: this.deps.settings,
      signal: runSignal,
      log,
      callTool,
      recordDegradation: async (error, data) => {
        log.warn({ category: error.category, error: error.message, ...data }, 'Stage degraded');
        await this.appendEvent(run, stage, {
          type: 'degraded',
          stage,
          data: { category: error.category, message: error.message, ...data },
        });
      },
    };
  }
}

export function createPipelineOrchestrator(
  config: AppConfig,
  store: SessionStore,
  tools: PipelineTools,
): PipelineOrchestrator {
  return new PipelineOrchestrator({
    store,
    tools,
    settings: config.pipeline,
    toolPolicy: config.tools,
    copywriting: {
      model: getCopywriterModel(tools.llm, config.copywriting.models),
      maxTokens: config.copywriting.maxTokens,
    },
  });
}
