import { setTimeout as delay } from "node:timers/promises";

import { ConfigurationError, describeError, isNodeError, toError } from "../errors.js";
import { checkPositive, DEFAULT_TELEMETRY_CONFIG } from "../config.js";
import {
  ERROR_CATEGORIES,
  type CircuitBreakerState,
  type ErrorCategory,
  type EscalationHook,
  type RecoveryContext,
  type RetryOutcome,
} from "../types.js";
import type { EventRecorder } from "./event-recorder.js";
import type { LogRouter } from "./log-router.js";
import { createRunLogger, type RunLogger } from "./run-logger.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface StrategyEnv {
  recorder: EventRecorder;
  log: RunLogger;
}

/** Resolves true when the fault was dealt with. A throw counts as false. */
export type RecoveryStrategy = (
  error: Error,
  context: RecoveryContext,
  env: StrategyEnv,
) => boolean | Promise<boolean>;

export interface RetryPolicy {
  initialDelayMs: number;
  maxDelayMs: number;
  base: number;
  jitter: boolean;
}

export interface RecoveryAction {
  category: ErrorCategory;
  maxAttempts: number;
  cooldownSeconds: number;
  strategy: RecoveryStrategy;
  escalation?: EscalationHook;
  retry: RetryPolicy;
}

export type RecoveryActionOverride = Partial<Omit<RecoveryAction, "category" | "retry">> & {
  retry?: Partial<RetryPolicy>;
};

export interface ErrorRecoveryOptions {
  /** Consecutive failures that open a category's circuit. */
  circuitThreshold?: number;
  /** Default circuit cooldown for every category. */
  cooldownSeconds?: number;
  actions?: Partial<Record<ErrorCategory, RecoveryActionOverride>>;
  sleep?: (ms: number) => Promise<void>;
  /** Uniform [0, 1) source for jitter. */
  random?: () => number;
  /** Epoch-millisecond clock. */
  now?: () => number;
}

export interface CategoryStats {
  attempts: number;
  successes: number;
  failures: number;
  escalations: number;
  shortCircuits: number;
  maxAttempts: number;
  cooldownSeconds: number;
  circuit: CircuitBreakerState & { open: boolean };
}

export interface RecoveryStats {
  totalAttempts: number;
  totalSuccesses: number;
  totalFailures: number;
  totalEscalations: number;
  successRate: number;
  categories: Record<ErrorCategory, CategoryStats>;
}

export interface RecoveryHealth {
  healthy: boolean;
  totalEscalations: number;
  escalatedCategories: ErrorCategory[];
  openCircuits: ErrorCategory[];
  successRate: number;
}

interface CategoryState {
  breaker: CircuitBreakerState;
  /** attempts since the last success; drives escalation */
  sinceSuccess: number;
  attempts: number;
  successes: number;
  failures: number;
  escalations: number;
  shortCircuits: number;
}

// ---------------------------------------------------------------------------
// Default strategies
// ---------------------------------------------------------------------------

function isDiskFull(error: Error): boolean {
  if (isNodeError(error) && error.code === "ENOSPC") return true;
  return error.message.includes("ENOSPC") || error.message.includes("No space left");
}

export const DEFAULT_STRATEGIES = {
  timeout: (error, context, { recorder }) => {
    recorder.recordConnection("error", {
      errorType: "timeout",
      port: context.port ?? "unknown",
      message: error.message,
    });
    return true;
  },

  connection_loss: async (error, context, { recorder, log }) => {
    const port = context.port ?? "unknown";
    recorder.recordConnection("disconnect", { port, error: error.message });

    if (context.reconnect) {
      try {
        await context.reconnect();
        recorder.recordConnection("reconnect", { port });
        return true;
      } catch (err) {
        log.error({ err, port }, `Reconnection failed: ${describeError(err)}`);
      }
    }

    if (context.fallback) {
      try {
        await context.fallback();
        recorder.recordModeChange("serial", "simulator", `Serial error: ${error.message}`);
        return true;
      } catch (err) {
        log.error({ err }, `Fallback failed: ${describeError(err)}`);
      }
    }
    return false;
  },

  file_write: async (error, context, { log }) => {
    if (isDiskFull(error)) {
      log.fatal("Disk full - cannot write logs!");
      if (!context.cleanup) return false;
      await context.cleanup();
      return true;
    }

    if (!context.buffer) return false;
    await context.buffer(context.data);
    log.info("Data buffered for later write");
    return true;
  },

  resource_exhaustion: async (error, context, { log }) => {
    log.fatal(`Resource exhaustion: ${error.message}`);
    if (!context.cleanup) return false;
    await context.cleanup();
    return true;
  },

  parse_failure: async (error, context, { log }) => {
    if (context.resetParser) await context.resetParser();
    log.info(`Parser reset after: ${error.message}`);
    return true;
  },

  generic: (error, _context, { log }) => {
    log.warn(`Generic error recovery for: ${error.message}`);
    return false;
  },
} satisfies Record<ErrorCategory, RecoveryStrategy>;

const DEFAULT_RETRY: Record<ErrorCategory, { maxAttempts: number; initialDelayMs: number }> = {
  connection_loss: { maxAttempts: 3, initialDelayMs: 1_000 },
  timeout: { maxAttempts: 5, initialDelayMs: 500 },
  parse_failure: { maxAttempts: 3, initialDelayMs: 100 },
  file_write: { maxAttempts: 3, initialDelayMs: 100 },
  resource_exhaustion: { maxAttempts: 2, initialDelayMs: 2_000 },
  generic: { maxAttempts: 3, initialDelayMs: 500 },
};

const MAX_DELAY_MS = 10_000;

/**
 * Backoff before the retry that follows attempt `attempt` (0-based):
 * min(initial * base^attempt, max), scaled by a factor in [0.5, 1.5) when
 * jitter is on.
 */
export function backoffDelay(policy: RetryPolicy, attempt: number, random: () => number = Math.random): number {
  const raw = Math.min(policy.initialDelayMs * policy.base ** attempt, policy.maxDelayMs);
  return policy.jitter ? raw * (0.5 + random()) : raw;
}

// ---------------------------------------------------------------------------
// ErrorRecoveryEngine
// ---------------------------------------------------------------------------

/**
 * Retry-with-backoff and a circuit breaker per error category. Actions are
 * fixed at construction; callers never see a strategy's exception.
 */
export class ErrorRecoveryEngine {
  private readonly recorder: EventRecorder;
  private readonly log: RunLogger;
  private readonly circuitThreshold: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;
  private readonly now: () => number;

  private readonly actions: Readonly<Record<ErrorCategory, Readonly<RecoveryAction>>>;
  private readonly state = new Map<ErrorCategory, CategoryState>();

  constructor(router: LogRouter, recorder: EventRecorder, options: ErrorRecoveryOptions = {}) {
    this.recorder = recorder;
    this.log = createRunLogger(router, "error-recovery");
    this.circuitThreshold = options.circuitThreshold ?? DEFAULT_TELEMETRY_CONFIG.circuitThreshold;
    this.sleep = options.sleep ?? ((ms) => delay(ms));
    this.random = options.random ?? Math.random;
    this.now = options.now ?? (() => Date.now());

    const cooldownSeconds = options.cooldownSeconds ?? DEFAULT_TELEMETRY_CONFIG.circuitCooldownSeconds;
    const issues = [
      ...checkPositive("circuitThreshold", this.circuitThreshold, true),
      ...checkPositive("cooldownSeconds", cooldownSeconds),
    ];

    const build = (category: ErrorCategory): Readonly<RecoveryAction> => {
      const override = options.actions?.[category] ?? {};
      const action: RecoveryAction = {
        category,
        maxAttempts: override.maxAttempts ?? DEFAULT_RETRY[category].maxAttempts,
        cooldownSeconds: override.cooldownSeconds ?? cooldownSeconds,
        strategy: override.strategy ?? DEFAULT_STRATEGIES[category],
        escalation: override.escalation,
        retry: {
          initialDelayMs: DEFAULT_RETRY[category].initialDelayMs,
          maxDelayMs: MAX_DELAY_MS,
          base: 2,
          jitter: true,
          ...override.retry,
        },
      };

      issues.push(
        ...checkPositive(`${category}.maxAttempts`, action.maxAttempts, true),
        ...checkPositive(`${category}.cooldownSeconds`, action.cooldownSeconds),
        ...checkPositive(`${category}.retry.initialDelayMs`, action.retry.initialDelayMs),
        ...checkPositive(`${category}.retry.maxDelayMs`, action.retry.maxDelayMs),
        ...checkPositive(`${category}.retry.base`, action.retry.base),
      );

      this.state.set(category, {
        breaker: { category, consecutiveFailures: 0, openUntil: null },
        sinceSuccess: 0,
        attempts: 0,
        successes: 0,
        failures: 0,
        escalations: 0,
        shortCircuits: 0,
      });
      return Object.freeze(action);
    };

    this.actions = {
      connection_loss: build("connection_loss"),
      timeout: build("timeout"),
      parse_failure: build("parse_failure"),
      file_write: build("file_write"),
      resource_exhaustion: build("resource_exhaustion"),
      generic: build("generic"),
    };

    if (issues.length > 0) {
      throw new ConfigurationError(issues);
    }
  }

  private stateFor(category: ErrorCategory): CategoryState {
    const state = this.state.get(category);
    if (!state) throw new Error(`Unknown error category: ${category}`);
    return state;
  }

  getAction(category: ErrorCategory): Readonly<RecoveryAction> {
    return this.actions[category];
  }

  // -----------------------------------------------------------------------
  // Retry
  // -----------------------------------------------------------------------

  /**
   * Run `operation` up to the category's maxAttempts, sleeping with
   * exponential backoff between attempts. On exhaustion the last error is
   * handed to recover() and a failed outcome is returned; this never throws
   * the operation's error.
   */
  async retryWithBackoff<T>(
    operation: () => T | Promise<T>,
    category: ErrorCategory = "generic",
    context: RecoveryContext = {},
  ): Promise<RetryOutcome<T>> {
    const action = this.actions[category];
    let lastError: Error = new Error(`No attempt made for ${category}`);

    for (let attempt = 0; attempt < action.maxAttempts; attempt++) {
      try {
        const value = await operation();
        if (attempt > 0) {
          this.log.info({ category, attempts: attempt + 1 }, `Succeeded on retry ${attempt + 1}`);
        }
        return { ok: true, value, attempts: attempt + 1 };
      } catch (err) {
        lastError = toError(err);
        this.log.warn(
          { category },
          `Attempt ${attempt + 1}/${action.maxAttempts} failed for ${category}: ${lastError.message}`,
        );

        if (attempt < action.maxAttempts - 1) {
          const wait = backoffDelay(action.retry, attempt, this.random);
          this.log.debug(`Retrying in ${(wait / 1000).toFixed(2)} seconds...`);
          await this.sleep(wait);
        }
      }
    }

    this.log.error({ category }, `All ${action.maxAttempts} attempts failed for ${category}`);
    const recovered = await this.recover(lastError, category, context);
    return { ok: false, error: lastError, attempts: action.maxAttempts, recovered };
  }

  // -----------------------------------------------------------------------
  // Recovery & circuit breaking
  // -----------------------------------------------------------------------

  /**
   * Run the category's strategy for `error`. Returns false without running
   * anything while the circuit is open. The first call after the cooldown
   * runs the strategy once; another failure reopens the circuit.
   */
  async recover(error: unknown, category: ErrorCategory = "generic", context: RecoveryContext = {}): Promise<boolean> {
    const err = toError(error);
    const action = this.actions[category];
    const state = this.stateFor(category);
    const { breaker } = state;

    if (breaker.openUntil !== null) {
      if (this.now() < breaker.openUntil) {
        state.shortCircuits++;
        this.log.warn({ category }, `Circuit breaker open for ${category}`);
        return false;
      }
      breaker.openUntil = null;
      this.log.info({ category }, `Circuit breaker cooldown elapsed for ${category}; retrying strategy`);
    }

    state.attempts++;
    state.sinceSuccess++;
    this.log.error({ category, attempt: state.sinceSuccess }, `Error occurred: ${category} - ${err.message}`);

    let ok: boolean;
    try {
      ok = await action.strategy(err, context, { recorder: this.recorder, log: this.log });
    } catch (strategyError) {
      this.log.error({ err: strategyError, category }, `Recovery failed for ${category}: ${describeError(strategyError)}`);
      ok = false;
    }

    if (ok) {
      state.successes++;
      breaker.consecutiveFailures = 0;
      breaker.openUntil = null;
      const attempt = state.sinceSuccess;
      state.sinceSuccess = 0;

      this.log.info({ category }, `Successfully recovered from ${category}`);
      this.recorder.record("error_recovery", { category, error: err.message, attemptNumber: attempt, success: true });
      return true;
    }

    state.failures++;
    breaker.consecutiveFailures++;
    if (breaker.consecutiveFailures >= this.circuitThreshold && breaker.openUntil === null) {
      breaker.openUntil = this.now() + action.cooldownSeconds * 1000;
      this.log.warn(
        { category, consecutiveFailures: breaker.consecutiveFailures, cooldownSeconds: action.cooldownSeconds },
        `Circuit breaker opened for ${category}`,
      );
    }

    if (state.sinceSuccess >= action.maxAttempts && action.escalation) {
      await this.escalate(action, state, err.message);
    }
    return false;
  }

  private async escalate(action: Readonly<RecoveryAction>, state: CategoryState, message: string): Promise<void> {
    state.escalations++;
    const { category } = action;

    this.log.fatal({ category, failedAttempts: state.sinceSuccess }, `ESCALATING ERROR: ${category} - ${message}`);
    this.recorder.record(
      "error_escalation",
      { category, message, failedRecoveryAttempts: state.sinceSuccess, escalationCount: state.escalations },
      "CRITICAL",
    );

    try {
      await action.escalation?.(category, message);
    } catch (err) {
      this.log.error({ err, category }, `Escalation hook failed for ${category}`);
    }
  }

  /** Circuit state without side effects. */
  getCircuitState(category: ErrorCategory): CircuitBreakerState & { open: boolean } {
    const { breaker } = this.stateFor(category);
    return { ...breaker, open: breaker.openUntil !== null && this.now() < breaker.openUntil };
  }

  // -----------------------------------------------------------------------
  // Queries
  // -----------------------------------------------------------------------

  getRecoveryStats(): RecoveryStats {
    let totalAttempts = 0;
    let totalSuccesses = 0;
    let totalFailures = 0;
    let totalEscalations = 0;

    for (const category of ERROR_CATEGORIES) {
      const s = this.stateFor(category);
      totalAttempts += s.attempts;
      totalSuccesses += s.successes;
      totalFailures += s.failures;
      totalEscalations += s.escalations;
    }

    return {
      totalAttempts,
      totalSuccesses,
      totalFailures,
      totalEscalations,
      successRate: totalSuccesses / Math.max(1, totalAttempts),
      categories: {
        connection_loss: this.categoryStats("connection_loss"),
        timeout: this.categoryStats("timeout"),
        parse_failure: this.categoryStats("parse_failure"),
        file_write: this.categoryStats("file_write"),
        resource_exhaustion: this.categoryStats("resource_exhaustion"),
        generic: this.categoryStats("generic"),
      },
    };
  }

  private categoryStats(category: ErrorCategory): CategoryStats {
    const s = this.stateFor(category);
    const action = this.actions[category];
    return {
      attempts: s.attempts,
      successes: s.successes,
      failures: s.failures,
      escalations: s.escalations,
      shortCircuits: s.shortCircuits,
      maxAttempts: action.maxAttempts,
      cooldownSeconds: action.cooldownSeconds,
      circuit: this.getCircuitState(category),
    };
  }

  healthCheck(): RecoveryHealth {
    const stats = this.getRecoveryStats();
    const escalatedCategories = ERROR_CATEGORIES.filter((c) => stats.categories[c].escalations > 0);
    const openCircuits = ERROR_CATEGORIES.filter((c) => stats.categories[c].circuit.open);

    return {
      healthy:
        stats.totalEscalations < 5 &&
        escalatedCategories.length < 3 &&
        (stats.totalAttempts === 0 || stats.successRate > 0.5),
      totalEscalations: stats.totalEscalations,
      escalatedCategories,
      openCircuits,
      successRate: stats.successRate,
    };
  }
}
