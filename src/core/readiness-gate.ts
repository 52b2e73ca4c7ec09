/**
 * Readiness Gate
 *
 * Tracks the model load state and decides whether a request may proceed.
 *
 * State machine (forward only, terminal states never change):
 *   not-loaded → loading → ready
 *                        ↘ failed(reason)
 *
 * Policy:
 * - Interactive triggers (no trigger, empty kind or `http`) are rejected at
 *   once when the model is not ready, so latency-sensitive callers never block.
 * - Background triggers poll for a bounded budget (retries × interval) and are
 *   released as soon as the state settles.
 */

import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import { NotReadyError } from '../api/errors.js';
import { isInteractiveTrigger, type ServingEvent } from '../types/event.js';

export type ReadinessState =
  | { kind: 'not-loaded' }
  | { kind: 'loading'; since: number }
  | { kind: 'ready'; since: number }
  | { kind: 'failed'; reason: Error; since: number };

export type ReadinessKind = ReadinessState['kind'];

export interface ReadinessGateEvents {
  settled: (state: ReadinessState) => void;
}

export interface WaitBudget {
  retries: number;
  intervalMs: number;
}

export interface ReadinessGateOptions {
  modelName: string;
  budget: WaitBudget;
  /** Start in the ready state (model object supplied up front) */
  ready?: boolean;
  logger?: Logger;
}

/** Allowed source states for each transition target */
const TRANSITIONS: Record<Exclude<ReadinessKind, 'not-loaded'>, ReadonlyArray<ReadinessKind>> = {
  loading: ['not-loaded'],
  ready: ['not-loaded', 'loading'],
  failed: ['not-loaded', 'loading'],
};

export class ReadinessGate extends EventEmitter<ReadinessGateEvents> {
  private readonly modelName: string;
  private readonly budget: WaitBudget;
  private readonly logger?: Logger;
  private state: ReadinessState;

  constructor(options: ReadinessGateOptions) {
    super();
    this.modelName = options.modelName;
    this.budget = options.budget;
    this.logger = options.logger;
    this.state = options.ready ? { kind: 'ready', since: Date.now() } : { kind: 'not-loaded' };
  }

  public getState(): ReadinessState {
    return this.state;
  }

  public isReady(): boolean {
    return this.state.kind === 'ready';
  }

  public isSettled(): boolean {
    return this.state.kind === 'ready' || this.state.kind === 'failed';
  }

  /** Last recorded failure reason, if the load failed */
  public failureReason(): Error | undefined {
    return this.state.kind === 'failed' ? this.state.reason : undefined;
  }

  public markLoading(): boolean {
    return this.transition({ kind: 'loading', since: Date.now() });
  }

  public setReady(): boolean {
    return this.transition({ kind: 'ready', since: Date.now() });
  }

  /**
   * Record a load failure. Waiters are released immediately with the reason.
   */
  public setFailed(reason: Error): boolean {
    return this.transition({ kind: 'failed', reason, since: Date.now() });
  }

  /**
   * Apply the readiness policy for an incoming event.
   *
   * @throws {NotReadyError} when the model cannot serve the event
   */
  public async check(event: Pick<ServingEvent, 'trigger'>): Promise<void> {
    if (this.isReady()) {
      return;
    }
    if (isInteractiveTrigger(event.trigger)) {
      throw new NotReadyError(this.modelName, this.failureReason()?.message);
    }
    this.logger?.info({ model: this.modelName, trigger: event.trigger?.kind }, 'Waiting for model to load');
    await this.awaitReady();
  }

  /**
   * Wait until the model is ready, up to `retries × intervalMs`.
   *
   * @throws {NotReadyError} on failure or when the budget runs out; carries the
   * last known failure reason
   */
  public async awaitReady(budget: WaitBudget = this.budget): Promise<void> {
    for (let attempt = 0; attempt < budget.retries; attempt++) {
      this.throwIfFailed();
      if (this.isReady()) {
        return;
      }
      await this.waitForSettle(budget.intervalMs);
    }

    if (this.isReady()) {
      return;
    }
    throw new NotReadyError(this.modelName, this.failureReason()?.message);
  }

  private throwIfFailed(): void {
    const reason = this.failureReason();
    if (reason) {
      throw new NotReadyError(this.modelName, reason.message);
    }
  }

  private transition(next: Exclude<ReadinessState, { kind: 'not-loaded' }>): boolean {
    if (!TRANSITIONS[next.kind].includes(this.state.kind)) {
      this.logger?.debug(
        { model: this.modelName, from: this.state.kind, to: next.kind },
        'Ignoring readiness transition'
      );
      return false;
    }

    const previous = this.state.kind;
    this.state = next;
    this.logger?.debug({ model: this.modelName, from: previous, to: next.kind }, 'Readiness transition');

    if (next.kind === 'ready' || next.kind === 'failed') {
      this.emit('settled', next);
    }
    return true;
  }

  /**
   * Sleep for one poll interval, waking early if the state settles
   */
  private waitForSettle(intervalMs: number): Promise<void> {
    return new Promise((resolve) => {
      const onSettled = (): void => {
        clearTimeout(timer);
        resolve();
      };
      const timer = setTimeout(() => {
        this.off('settled', onSettled);
        resolve();
      }, intervalMs);
      this.once('settled', onSettled);
    });
  }
}
