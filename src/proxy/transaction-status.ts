/** Node status strings grouped by outcome. Matching is case-insensitive. */
export interface StatusRules {
  pending: readonly string[];
  success: readonly string[];
  failed: readonly string[];
  invalid: readonly string[];
}

export const DEFAULT_STATUS_RULES: StatusRules = Object.freeze({
  pending: ["pending", "received", "partially-executed"],
  success: ["success", "successful", "executed"],
  failed: ["fail", "failed"],
  invalid: ["invalid"],
});

/** Add node-specific status strings on top of `base` */
export function extendStatusRules(base: StatusRules, extra?: Partial<StatusRules>): StatusRules {
  if (!extra) return base;
  return {
    pending: [...base.pending, ...(extra.pending ?? [])],
    success: [...base.success, ...(extra.success ?? [])],
    failed: [...base.failed, ...(extra.failed ?? [])],
    invalid: [...base.invalid, ...(extra.invalid ?? [])],
  };
}

function matches(list: readonly string[], status: string): boolean {
  return list.some((entry) => entry.toLowerCase() === status);
}

/**
 * Transaction status as reported by the node. Strings outside the terminal sets,
 * including ones this library has never seen, count as pending.
 */
export class TransactionStatus {
  private readonly normalized: string;

  constructor(
    readonly status: string,
    private readonly rules: StatusRules = DEFAULT_STATUS_RULES,
  ) {
    this.normalized = status.trim().toLowerCase();
  }

  isSuccessful(): boolean {
    return matches(this.rules.success, this.normalized);
  }

  isFailed(): boolean {
    return matches(this.rules.failed, this.normalized);
  }

  isInvalid(): boolean {
    return matches(this.rules.invalid, this.normalized);
  }

  isTerminal(): boolean {
    return this.isSuccessful() || this.isFailed() || this.isInvalid();
  }

  isPending(): boolean {
    return !this.isTerminal();
  }

  toString(): string {
    return this.status;
  }

  toJSON(): string {
    return this.status;
  }
}
