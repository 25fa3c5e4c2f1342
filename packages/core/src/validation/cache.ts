import { hash } from 'ohash';
import { LRUCache } from '@crucible/shared';
import type { RuleResult, Validator } from './types';

/** Exact text: leading lines shift the line numbers rules report */
export function hashArtifact(artifact: string): string {
  return hash(artifact);
}

/** Name, version and effective parameters; any change gives a new identity */
export function ruleIdentity(rule: Validator): string {
  return `${rule.name}@${rule.version}:${hash(rule.config())}`;
}

export interface CacheStats {
  size: number;
  capacity: number;
  hits: number;
  misses: number;
  evictions: number;
  hitRate: number;
}

/**
 * LRU map of (artifact hash, rule identity) to rule results. Stored results are
 * copies, and `get` hands out copies flagged `cached` with zero duration.
 */
export class ValidationCache {
  private readonly entries: LRUCache<string, RuleResult>;
  private hits = 0;
  private misses = 0;
  private evictions = 0;

  constructor(capacity = 256) {
    this.entries = new LRUCache(capacity);
  }

  get(artifactHash: string, ruleId: string): RuleResult | undefined {
    const stored = this.entries.get(this.key(artifactHash, ruleId));
    if (!stored) {
      this.misses++;
      return undefined;
    }
    this.hits++;
    return { ...stored, errors: [...stored.errors], warnings: [...stored.warnings], durationMs: 0, cached: true };
  }

  put(artifactHash: string, ruleId: string, result: RuleResult): void {
    const evicted = this.entries.set(this.key(artifactHash, ruleId), {
      ...result,
      errors: [...result.errors],
      warnings: [...result.warnings],
    });
    if (evicted !== undefined) {
      this.evictions++;
    }
  }

  stats(): CacheStats {
    const lookups = this.hits + this.misses;
    return {
      size: this.entries.size,
      capacity: this.entries.capacity,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      hitRate: lookups === 0 ? 0 : this.hits / lookups,
    };
  }

  clear(): void {
    this.entries.clear();
    this.hits = 0;
    this.misses = 0;
    this.evictions = 0;
  }

  private key(artifactHash: string, ruleId: string): string {
    return `${artifactHash}|${ruleId}`;
  }
}
