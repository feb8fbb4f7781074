import type { DataSource, ProviderCapability, QueryFilterSlot, QueryPlan } from '../kernel/types.js';
import { dataskopProviderStrategy } from './providers/dataskop.js';
import { fiwareProviderStrategy } from './providers/fiware.js';

/** Translates an abstract data query into one provider dialect. */
export interface ProviderStrategy {
  readonly provider: string;
  readonly dialect: QueryPlan['dialect'];
  readonly capabilities: readonly ProviderCapability[];
  readonly compile: (source: DataSource, filters: readonly QueryFilterSlot[]) => QueryPlan;
}

export type ProviderRegistry = ReadonlyMap<string, ProviderStrategy>;

export const BUILTIN_PROVIDER_STRATEGIES: readonly ProviderStrategy[] = [
  fiwareProviderStrategy,
  dataskopProviderStrategy,
];

/** Throws on a repeated provider tag. */
export function createProviderRegistry(
  strategies: readonly ProviderStrategy[] = BUILTIN_PROVIDER_STRATEGIES,
): ProviderRegistry {
  const registry = new Map<string, ProviderStrategy>();
  for (const strategy of strategies) {
    if (registry.has(strategy.provider)) {
      throw new Error(`Provider strategy "${strategy.provider}" is registered more than once.`);
    }
    registry.set(strategy.provider, strategy);
  }
  return registry;
}
