/**
 * Circuit Breaker Service
 *
 * In-process state, one instance per registration, shared by every call routed
 * through it. Opens when the failure ratio over the sampling window reaches
 * failureRatio with at least minimumThroughput samples. After breakDuration a
 * single probe is let through (HALF_OPEN); its outcome closes or reopens the
 * circuit. A probe that has not reported within another breakDuration loses its
 * slot to the next caller. Node runs these methods to completion without interleaving, so the
 * counters need no locking.
 */

import { Logger, errorMessage } from '../core/Logger';
import type { Clock } from '../../types/CommonTypes';
import { systemClock } from '../../types/CommonTypes';
import type { ExperimentMetrics } from '../../types/MetricsTypes';
import {
  CircuitBreakerOptionsSchema,
  type AllowRequestResult,
  type CircuitBreaker,
  type CircuitBreakerOptions,
  type CircuitBreakerOptionsInput,
  type CircuitBreakerSnapshot,
  type CircuitState,
} from '../../types/CircuitBreakerTypes';

interface Sample {
  at: number;
  failed: boolean;
}

export const CIRCUIT_STATE_GAUGE = 'experiment_circuit_state';

const STATE_GAUGE_VALUE: Record<CircuitState, number> = {
  CLOSED: 0,
  HALF_OPEN: 1,
  OPEN: 2,
};

export class CircuitBreakerService implements CircuitBreaker {
  readonly options: CircuitBreakerOptions;

  private state: CircuitState = 'CLOSED';
  private samples: Sample[] = [];
  private failureCount = 0;
  private openedAt?: number;
  private openUntil?: number;
  private probeInFlight = false;
  private probeStartedAt = 0;

  constructor(
    private readonly serviceType: string,
    options: CircuitBreakerOptionsInput,
    private readonly logger: Logger,
    private readonly clock: Clock = systemClock,
    private readonly metrics?: ExperimentMetrics
  ) {
    this.options = CircuitBreakerOptionsSchema.parse(options);
  }

  /**
   * Check if an attempt may proceed. Past the break duration, the first caller
   * takes the half-open probe slot; everyone else is rejected until it reports.
   */
  allowRequest(): AllowRequestResult {
    const now = this.clock.now();

    if (this.state === 'CLOSED') {
      return { allowed: true, state: 'CLOSED' };
    }

    if (this.state === 'OPEN') {
      const openUntil = this.openUntil ?? now;
      if (now < openUntil) {
        return { allowed: false, state: 'OPEN', retryAfterMs: openUntil - now };
      }
      this.transition('HALF_OPEN');
      return this.grantProbe(now);
    }

    const probeDeadline = this.probeStartedAt + this.options.breakDurationMs;
    if (!this.probeInFlight) {
      return this.grantProbe(now);
    }
    if (now >= probeDeadline) {
      this.logger.warn('Half-open probe did not report in time; granting a new probe', {
        serviceType: this.serviceType,
        probeStartedAt: this.probeStartedAt,
      });
      return this.grantProbe(now);
    }
    return { allowed: false, state: 'HALF_OPEN', retryAfterMs: probeDeadline - now };
  }

  recordSuccess(probe = false): void {
    if (this.state === 'HALF_OPEN') {
      if (!probe) return;
      this.probeInFlight = false;
      this.clearSamples();
      this.openedAt = undefined;
      this.openUntil = undefined;
      this.transition('CLOSED');
      this.logger.info('Circuit closed after successful probe', { serviceType: this.serviceType });
      return;
    }
    if (this.state === 'CLOSED') {
      this.addSample(false);
    }
  }

  recordFailure(probe = false): void {
    if (this.state === 'HALF_OPEN') {
      if (!probe) return;
      this.probeInFlight = false;
      this.open();
      this.logger.info('Circuit reopened after probe failure', { serviceType: this.serviceType });
      return;
    }
    if (this.state !== 'CLOSED') {
      return;
    }

    this.addSample(true);
    const total = this.samples.length;
    const failures = this.failureCount;
    if (total >= this.options.minimumThroughput && failures / total >= this.options.failureRatio) {
      this.open();
      this.logger.warn('Circuit opened', {
        serviceType: this.serviceType,
        failures,
        samples: total,
        breakDurationMs: this.options.breakDurationMs,
      });
    }
  }

  getState(): CircuitState {
    return this.state;
  }

  snapshot(): CircuitBreakerSnapshot {
    this.prune(this.clock.now());
    return {
      state: this.state,
      samples: this.samples.length,
      failures: this.failureCount,
      openedAt: this.openedAt,
      openUntil: this.openUntil,
    };
  }

  private grantProbe(now: number): AllowRequestResult {
    this.probeInFlight = true;
    this.probeStartedAt = now;
    return { allowed: true, state: 'HALF_OPEN', probe: true };
  }

  private open(): void {
    const now = this.clock.now();
    this.openedAt = now;
    this.openUntil = now + this.options.breakDurationMs;
    this.clearSamples();
    this.transition('OPEN');
  }

  private clearSamples(): void {
    this.samples = [];
    this.failureCount = 0;
  }

  private addSample(failed: boolean): void {
    const now = this.clock.now();
    this.prune(now);
    this.samples.push({ at: now, failed });
    if (failed) this.failureCount++;
  }

  private prune(now: number): void {
    const cutoff = now - this.options.samplingDurationMs;
    let drop = 0;
    while (drop < this.samples.length && this.samples[drop].at <= cutoff) {
      if (this.samples[drop].failed) this.failureCount--;
      drop++;
    }
    if (drop > 0) {
      this.samples = this.samples.slice(drop);
    }
  }

  private transition(next: CircuitState): void {
    if (next === this.state) return;
    const previous = this.state;
    this.state = next;
    this.logger.debug('Circuit state changed', { serviceType: this.serviceType, from: previous, to: next });
    if (!this.metrics) return;
    try {
      this.metrics.setGauge(CIRCUIT_STATE_GAUGE, STATE_GAUGE_VALUE[next], { service: this.serviceType });
    } catch (error) {
      this.logger.warn('Failed to publish circuit state gauge', {
        serviceType: this.serviceType,
        error: errorMessage(error),
      });
    }
  }
}
