import { sleep } from './sleep.js';
import type { SleepFn } from './types.js';

export interface ClientRateLimiterOptions {
  /** Clock in milliseconds */
  now?: () => number;
  sleep?: SleepFn;
}

export interface RateLimiterSnapshot {
  readonly enabled: boolean;
  readonly fillRate: number;
  readonly maxCapacity: number;
  readonly currentCapacity: number;
  readonly measuredTxRate: number;
  readonly lastMaxRate: number;
}

/** Multiplicative decrease applied on throttling */
const BETA = 0.7;
/** Growth of the cubic curve after a throttle */
const SCALE_CONSTANT = 0.4;
/** Weight of the newest send-rate sample */
const SMOOTH = 0.8;
const MIN_FILL_RATE = 0.5;
const MIN_CAPACITY = 1;

/**
 * Rounded to 8 decimals so rates compare stably across platforms
 */
const precise = (value: number): number => parseFloat(value.toFixed(8));

/**
 * Client-side send-rate limiter for adaptive retry mode.
 *
 * A token bucket whose fill rate follows a CUBIC curve: a throttling
 * response cuts the rate to BETA of the rate in use, and successes grow it
 * back along `SCALE_CONSTANT × (t − lastThrottle − window)³ + lastMaxRate`.
 * The new rate never exceeds twice the measured send rate. The bucket only
 * starts limiting after the first throttling response. One instance is shared
 * by all calls on a client; rates are in requests per second.
 */
export class ClientRateLimiter {
  private readonly now: () => number;
  private readonly sleep: SleepFn;

  private enabled = false;
  private fillRate = MIN_FILL_RATE;
  private maxCapacity = MIN_CAPACITY;
  private currentCapacity = 0;
  private lastRefillAt: number | undefined;

  private measuredTxRate = 0;
  private requestCount = 0;
  private lastTxRateBucket: number;

  private lastMaxRate = 0;
  private lastThrottleTime: number;
  private timeWindow = 0;

  constructor(options: ClientRateLimiterOptions = {}) {
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? sleep;
    this.lastThrottleTime = this.seconds();
    this.lastTxRateBucket = Math.floor(this.seconds());
  }

  /**
   * Wait until one request may be sent. Resolves at once while the limiter is not engaged.
   */
  async acquireSendToken(signal?: AbortSignal): Promise<void> {
    if (!this.enabled) {
      return;
    }

    this.refill();
    if (this.currentCapacity < 1) {
      const delayMs = ((1 - this.currentCapacity) / this.fillRate) * 1000;
      await this.sleep(delayMs, signal);
    }
    this.currentCapacity -= 1;
  }

  /**
   * Feed back the result of an attempt
   * @param throttled whether the response was a throttling error
   */
  updateSendingRate(throttled: boolean): void {
    this.updateMeasuredRate();

    let calculatedRate: number;
    if (throttled) {
      const rateToUse = this.enabled ? Math.min(this.measuredTxRate, this.fillRate) : this.measuredTxRate;
      this.lastMaxRate = rateToUse;
      this.updateTimeWindow();
      this.lastThrottleTime = this.seconds();
      calculatedRate = precise(rateToUse * BETA);
      this.enabled = true;
    } else {
      this.updateTimeWindow();
      const elapsed = this.seconds() - this.lastThrottleTime - this.timeWindow;
      calculatedRate = precise(SCALE_CONSTANT * elapsed ** 3 + this.lastMaxRate);
    }

    this.setFillRate(Math.min(calculatedRate, 2 * this.measuredTxRate));
  }

  snapshot(): RateLimiterSnapshot {
    return {
      enabled: this.enabled,
      fillRate: this.fillRate,
      maxCapacity: this.maxCapacity,
      currentCapacity: this.currentCapacity,
      measuredTxRate: this.measuredTxRate,
      lastMaxRate: this.lastMaxRate,
    };
  }

  private seconds(): number {
    return this.now() / 1000;
  }

  private refill(): void {
    const timestamp = this.seconds();
    if (this.lastRefillAt === undefined) {
      this.lastRefillAt = timestamp;
      return;
    }
    const fillAmount = (timestamp - this.lastRefillAt) * this.fillRate;
    this.currentCapacity = Math.min(this.maxCapacity, this.currentCapacity + fillAmount);
    this.lastRefillAt = timestamp;
  }

  private setFillRate(newRate: number): void {
    this.refill();
    this.fillRate = Math.max(newRate, MIN_FILL_RATE);
    this.maxCapacity = Math.max(newRate, MIN_CAPACITY);
    this.currentCapacity = Math.min(this.currentCapacity, this.maxCapacity);
  }

  private updateTimeWindow(): void {
    this.timeWindow = precise(Math.cbrt((this.lastMaxRate * (1 - BETA)) / SCALE_CONSTANT));
  }

  /**
   * Smoothed requests per second, sampled in half-second buckets
   */
  private updateMeasuredRate(): void {
    const timeBucket = Math.floor(this.seconds() * 2) / 2;
    this.requestCount += 1;

    if (timeBucket > this.lastTxRateBucket) {
      const currentRate = this.requestCount / (timeBucket - this.lastTxRateBucket);
      this.measuredTxRate = precise(currentRate * SMOOTH + this.measuredTxRate * (1 - SMOOTH));
      this.requestCount = 0;
      this.lastTxRateBucket = timeBucket;
    }
  }
}
