import CircuitBreaker from "opossum";

export interface CircuitBreakerOptions {
  /** Timeout in milliseconds after which the call is considered failed. Default: 60000 */
  timeout?: number;
  /** Error percentage at which to open the circuit. Default: 50 */
  errorThresholdPercentage?: number;
  /** Time in milliseconds to wait before attempting to close the circuit. Default: 30000 */
  resetTimeout?: number;
  /** Minimum number of calls in the rolling window before the circuit may open. Default: 5 */
  volumeThreshold?: number;
}

/** The slice of a logger the breaker reports state changes to. */
export interface BreakerEventSink {
  warn(obj: Record<string, unknown>, msg: string): void;
}

const DEFAULT_OPTIONS: Required<CircuitBreakerOptions> = {
  timeout: 60_000,
  errorThresholdPercentage: 50,
  resetTimeout: 30_000,
  volumeThreshold: 5,
};

export function createCircuitBreaker<TI extends unknown[], TR>(
  name: string,
  fn: (...args: TI) => Promise<TR>,
  options?: CircuitBreakerOptions,
  events?: BreakerEventSink,
): CircuitBreaker<TI, TR> {
  const mergedOptions = { ...DEFAULT_OPTIONS, ...options, name };

  const breaker = new CircuitBreaker<TI, TR>(fn, mergedOptions);

  breaker.on("open", () => {
    events?.warn({ breaker: name, state: "open" }, "circuit opened, calls are short-circuited");
  });

  breaker.on("halfOpen", () => {
    events?.warn({ breaker: name, state: "half-open" }, "circuit half-open, next call is a trial");
  });

  breaker.on("close", () => {
    events?.warn({ breaker: name, state: "closed" }, "circuit closed");
  });

  return breaker;
}
