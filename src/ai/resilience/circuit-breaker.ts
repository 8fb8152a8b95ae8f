import type { Logger } from "../../config/logger";

export type CircuitState = "CLOSED" | "OPEN" | "HALF_OPEN";

export interface CircuitBreakerOptions {
  name: string;
  failureThreshold: number;
  windowMs: number;
  cooldownMs: number;
  now?: () => number;
  logger?: Logger;
}

export type CircuitPermit =
  | {
      allowed: true;
      probe: boolean;
    }
  | {
      allowed: false;
      retryAfterMs: number;
    };

const circuitTransitions: Record<CircuitState, CircuitState[]> = {
  CLOSED: ["OPEN"],
  OPEN: ["HALF_OPEN"],
  HALF_OPEN: ["CLOSED", "OPEN"],
};

export class CircuitBreaker {
  private state: CircuitState = "CLOSED";
  private failureTimestamps: number[] = [];
  private openedAt = 0;
  private probeInFlight = false;
  private readonly now: () => number;

  constructor(private readonly options: CircuitBreakerOptions) {
    this.now = options.now ?? Date.now;
  }

  getState(): CircuitState {
    this.applyCooldown();
    return this.state;
  }

  tryAcquire(): CircuitPermit {
    this.applyCooldown();

    if (this.state === "OPEN") {
      return {
        allowed: false,
        retryAfterMs: Math.max(0, this.options.cooldownMs - (this.now() - this.openedAt)),
      };
    }
    if (this.state === "HALF_OPEN") {
      if (this.probeInFlight) {
        return { allowed: false, retryAfterMs: 0 };
      }
      this.probeInFlight = true;
      return { allowed: true, probe: true };
    }
    return { allowed: true, probe: false };
  }

  recordSuccess(permit: CircuitPermit): void {
    if (!permit.allowed) {
      return;
    }
    if (permit.probe) {
      this.probeInFlight = false;
      if (this.state === "HALF_OPEN") {
        this.transition("CLOSED");
      }
      return;
    }
    if (this.state === "CLOSED") {
      this.failureTimestamps = [];
    }
  }

  recordFailure(permit: CircuitPermit): void {
    if (!permit.allowed) {
      return;
    }
    if (permit.probe) {
      this.probeInFlight = false;
      if (this.state === "HALF_OPEN") {
        this.transition("OPEN");
      }
      return;
    }
    if (this.state !== "CLOSED") {
      return;
    }

    const now = this.now();
    this.failureTimestamps = this.failureTimestamps.filter(
      (timestamp) => now - timestamp <= this.options.windowMs,
    );
    this.failureTimestamps.push(now);
    if (this.failureTimestamps.length >= this.options.failureThreshold) {
      this.transition("OPEN");
    }
  }

  release(permit: CircuitPermit): void {
    if (permit.allowed && permit.probe) {
      this.probeInFlight = false;
    }
  }

  private applyCooldown(): void {
    if (this.state === "OPEN" && this.now() - this.openedAt >= this.options.cooldownMs) {
      this.transition("HALF_OPEN");
    }
  }

  private transition(to: CircuitState): void {
    const from = this.state;
    if (!circuitTransitions[from].includes(to)) {
      throw new Error(`Invalid circuit transition from ${from} to ${to}`);
    }
    this.state = to;
    if (to === "OPEN") {
      this.openedAt = this.now();
    }
    if (to === "CLOSED" || to === "OPEN") {
      this.failureTimestamps = [];
    }
    this.options.logger?.warn("circuit.state.changed", {
      circuit: this.options.name,
      from,
      to,
    });
  }
}
