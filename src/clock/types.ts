export interface Clock {
  /** Current time in epoch milliseconds */
  now(): number;
  /** Resolve once, after `ms` milliseconds */
  after(ms: number): Promise<void>;
}
