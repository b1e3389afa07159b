/**
 * Token Budget
 *
 * Per-category token bookkeeping against a fixed ceiling. Pure accounting:
 * callers decide what to evict, this only reports headroom.
 */

export const BUDGET_CATEGORIES = [
  'system',
  'current',
  'workspace',
  'error',
  'active',
  'history',
  'context',
] as const;

export type BudgetCategory = (typeof BUDGET_CATEGORIES)[number];

/** Never evicted: the instructions and the request being answered. */
export const PROTECTED_CATEGORIES: readonly BudgetCategory[] = ['system', 'current'];

/** Eviction order, first entry goes first. */
export const TRIM_PRIORITY: readonly BudgetCategory[] = ['workspace', 'error', 'active', 'history', 'context'];

const CODE_MARKERS = ['def ', 'class ', 'import ', 'function ', 'const ', 'print(', 'console.log('];

/**
 * Rough token estimate: about 3 characters per token for code, 4 for prose.
 * Good enough for budgeting, not for billing.
 */
export function estimateTokens(text: string): number {
  const charsPerToken = CODE_MARKERS.some(marker => text.includes(marker)) ? 3 : 4;
  return Math.floor(text.length / charsPerToken);
}

export interface CategoryUsage<C extends string = BudgetCategory> {
  category: C;
  used: number;
  available: number;
  trimmable: boolean;
  /** Position in TRIM_PRIORITY, undefined for categories outside it */
  priority?: number;
}

export class TokenBudget<C extends string = BudgetCategory> {
  private readonly usage = new Map<C, number>();

  constructor(
    readonly maxTokens: number,
    categories: readonly C[],
    private readonly trimOrder: readonly C[] = []
  ) {
    if (!Number.isFinite(maxTokens) || maxTokens <= 0) {
      throw new RangeError(`Token ceiling must be positive, got ${maxTokens}`);
    }
    for (const category of categories) {
      this.usage.set(category, 0);
    }
  }

  /** Replace (not add to) the usage of one category. */
  update(category: C, tokens: number): void {
    this.usage.set(category, Math.max(0, Math.floor(tokens)));
  }

  get(category: C): number {
    return this.usage.get(category) ?? 0;
  }

  totalUsed(): number {
    let total = 0;
    for (const tokens of this.usage.values()) {
      total += tokens;
    }
    return total;
  }

  available(): number {
    return Math.max(0, this.maxTokens - this.totalUsed());
  }

  /** One entry per category, in declaration order. */
  usageReport(): CategoryUsage<C>[] {
    const available = this.available();
    return [...this.usage].map(([category, used]) => {
      const rank = this.trimOrder.indexOf(category);
      return {
        category,
        used,
        available,
        trimmable: rank !== -1,
        ...(rank !== -1 ? { priority: rank } : {}),
      };
    });
  }

  reset(): void {
    for (const category of this.usage.keys()) {
      this.usage.set(category, 0);
    }
  }
}

export function createConversationBudget(maxTokens: number): TokenBudget<BudgetCategory> {
  return new TokenBudget<BudgetCategory>(maxTokens, BUDGET_CATEGORIES, TRIM_PRIORITY);
}
