/**
 * Model Loader
 *
 * Runs the capability's load() hook at most once per process and drives the
 * readiness gate from its outcome.
 *
 * - sync: the caller awaits the load; a failure is rethrown as LoadError.
 * - async: the load is scheduled on the next event-loop turn and runLoad()
 *   returns immediately; the outcome is observed by the settle callback.
 *
 * Either way the settle callback fires exactly once, after the gate has
 * reached its terminal state.
 */

import type { Logger } from 'pino';
import { LoadError, asError } from '../api/errors.js';
import type { ReadinessGate } from './readiness-gate.js';

export type LoadMode = 'sync' | 'async';

export type LoadOutcome =
  | { status: 'ready'; durationMs: number; skipped: boolean }
  | { status: 'failed'; durationMs: number; error: LoadError };

export interface ModelLoaderOptions {
  modelName: string;
  gate: ReadinessGate;
  load: () => Promise<void> | void;
  onSettled?: (outcome: LoadOutcome) => Promise<void> | void;
  logger?: Logger;
}

const yieldToEventLoop = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));

export class ModelLoader {
  private readonly modelName: string;
  private readonly gate: ReadinessGate;
  private readonly load: () => Promise<void> | void;
  private readonly onSettled?: (outcome: LoadOutcome) => Promise<void> | void;
  private readonly logger?: Logger;

  private task: Promise<LoadOutcome> | null = null;

  constructor(options: ModelLoaderOptions) {
    this.modelName = options.modelName;
    this.gate = options.gate;
    this.load = options.load;
    this.onSettled = options.onSettled;
    this.logger = options.logger;
  }

  /**
   * Start (or join) the model load.
   *
   * @throws {LoadError} in sync mode when the load hook fails
   */
  public async runLoad(mode: LoadMode = 'sync'): Promise<void> {
    if (!this.task) {
      this.task = this.start(mode);
    }

    if (mode === 'async') {
      this.logger?.info({ model: this.modelName }, 'Started async model loading');
      return;
    }

    const outcome = await this.task;
    if (outcome.status === 'failed') {
      throw outcome.error;
    }
  }

  /**
   * Resolves once the load and the settle callback have completed.
   * Undefined when runLoad() was never called.
   */
  public whenSettled(): Promise<LoadOutcome> | undefined {
    return this.task ?? undefined;
  }

  private async start(mode: LoadMode): Promise<LoadOutcome> {
    if (mode === 'async') {
      await yieldToEventLoop();
    }
    const outcome = await this.execute();
    await this.notifySettled(outcome);
    return outcome;
  }

  private async execute(): Promise<LoadOutcome> {
    if (this.gate.isReady()) {
      return { status: 'ready', durationMs: 0, skipped: true };
    }

    this.gate.markLoading();
    const startedAt = Date.now();

    try {
      await this.load();
    } catch (error) {
      const loadError = new LoadError(this.modelName, asError(error));
      this.gate.setFailed(loadError.cause ?? loadError);
      this.logger?.error({ model: this.modelName, err: loadError.cause }, 'Model load failed');
      return { status: 'failed', durationMs: Date.now() - startedAt, error: loadError };
    }

    this.gate.setReady();
    const durationMs = Date.now() - startedAt;
    this.logger?.info({ model: this.modelName, durationMs }, 'Model loaded');
    return { status: 'ready', durationMs, skipped: false };
  }

  private async notifySettled(outcome: LoadOutcome): Promise<void> {
    if (!this.onSettled) {
      return;
    }
    try {
      await this.onSettled(outcome);
    } catch (error) {
      this.logger?.error({ model: this.modelName, err: error }, 'Post-load initialization failed');
    }
  }
}
