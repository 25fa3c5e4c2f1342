import type { Config, ModelPricing, Usage } from '@crucible/shared';

export interface ProviderUsageStats {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
  estimatedCostUsd?: number | null;
}

export interface CostSummary {
  providers: Record<string, ProviderUsageStats>;
  total: ProviderUsageStats;
  budgetUsd?: number;
  remainingBudgetUsd?: number;
}

export interface CostTrackerOptions {
  /** Spending ceiling; when unset the tracker never reports an exhausted budget */
  budgetUsd?: number;
}

/**
 * Accumulates token usage per provider and prices it with the per-million-token
 * rates from the provider config. Going over the budget is only reported, never thrown.
 */
export class CostTracker {
  private usageMap = new Map<string, ProviderUsageStats>();
  private readonly budgetUsd?: number;

  constructor(
    private readonly config: Pick<Config, 'providers'> = { providers: {} },
    options: CostTrackerOptions = {},
  ) {
    this.budgetUsd = options.budgetUsd;
  }

  /**
   * Records one call's usage and returns its estimated cost in USD (0 when the
   * provider has no pricing). `pricing` overrides the configured rates.
   */
  recordUsage(providerId: string, usage: Usage, pricing?: ModelPricing): number {
    const stats = this.getProviderStats(providerId);

    const input = usage.inputTokens || 0;
    const output = usage.outputTokens || 0;
    const total = usage.totalTokens || input + output;

    stats.inputTokens += input;
    stats.outputTokens += output;
    stats.totalTokens += total;

    const rates = pricing ?? this.config.providers[providerId]?.pricing;
    if (!rates) {
      return 0;
    }

    let cost = 0;
    let hasPricing = false;
    if (rates.inputPerMTokUsd !== undefined) {
      cost += (input / 1_000_000) * rates.inputPerMTokUsd;
      hasPricing = true;
    }
    if (rates.outputPerMTokUsd !== undefined) {
      cost += (output / 1_000_000) * rates.outputPerMTokUsd;
      hasPricing = true;
    }
    if (hasPricing) {
      stats.estimatedCostUsd = (stats.estimatedCostUsd || 0) + cost;
    }
    return cost;
  }

  get totalCostUsd(): number {
    let sum = 0;
    for (const stats of this.usageMap.values()) {
      sum += stats.estimatedCostUsd ?? 0;
    }
    return sum;
  }

  get remainingBudgetUsd(): number | undefined {
    if (this.budgetUsd === undefined) return undefined;
    return Math.max(0, this.budgetUsd - this.totalCostUsd);
  }

  hasBudget(): boolean {
    return this.budgetUsd === undefined || this.totalCostUsd < this.budgetUsd;
  }

  reset(): void {
    this.usageMap.clear();
  }

  private getProviderStats(providerId: string): ProviderUsageStats {
    let stats = this.usageMap.get(providerId);
    if (!stats) {
      stats = {
        inputTokens: 0,
        outputTokens: 0,
        totalTokens: 0,
        estimatedCostUsd: null,
      };
      this.usageMap.set(providerId, stats);
    }
    return stats;
  }

  getSummary(): CostSummary {
    const total: ProviderUsageStats = {
      inputTokens: 0,
      outputTokens: 0,
      totalTokens: 0,
      estimatedCostUsd: null,
    };

    const providers: Record<string, ProviderUsageStats> = {};
    let totalCost: number | null = null;

    for (const [id, stats] of this.usageMap.entries()) {
      providers[id] = { ...stats };
      total.inputTokens += stats.inputTokens;
      total.outputTokens += stats.outputTokens;
      total.totalTokens += stats.totalTokens;

      if (typeof stats.estimatedCostUsd === 'number') {
        if (totalCost === null) totalCost = 0;
        totalCost += stats.estimatedCostUsd;
      }
    }

    total.estimatedCostUsd = totalCost;

    return {
      providers,
      total,
      budgetUsd: this.budgetUsd,
      remainingBudgetUsd: this.remainingBudgetUsd,
    };
  }
}
