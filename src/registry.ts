/**
 * Policy Gate — Policy Reference
 *
 * Holds the current policy snapshot. Readers take `current()` once per
 * evaluation; writers swap in a new immutable Policy, so an evaluation in
 * flight keeps the snapshot it started with.
 */

import type { Policy } from "./policy.js";

export class PolicyRef {
  private policy: Policy;
  private revision = 0;

  constructor(initial: Policy) {
    this.policy = initial;
  }

  current(): Policy {
    return this.policy;
  }

  /** Number of swaps since construction. */
  get version(): number {
    return this.revision;
  }

  /** Swap in `next` and return the snapshot it replaced. */
  replace(next: Policy): Policy {
    const previous = this.policy;
    this.policy = next;
    this.revision++;
    return previous;
  }

  /** Derive the next snapshot from the current one. A throwing `fn` leaves the ref unchanged. */
  update(fn: (current: Policy) => Policy): Policy {
    const next = fn(this.policy);
    this.replace(next);
    return next;
  }
}
