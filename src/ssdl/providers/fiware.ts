import type { DataSource, NgsiV2QueryPlan, QueryFilterSlot } from '../../kernel/types.js';
import type { ProviderStrategy } from '../provider-registry.js';
import { joinEndpoint } from './endpoint.js';

// NGSI-v2 entity listing; keyValues keeps attribute payloads flat.
export const fiwareProviderStrategy: ProviderStrategy = {
  provider: 'Fiware',
  dialect: 'ngsi-v2',
  capabilities: ['geo-filter', 'time-range'],
  compile: (source: DataSource, filters: readonly QueryFilterSlot[]): NgsiV2QueryPlan => ({
    provider: source.provider,
    dialect: 'ngsi-v2',
    method: 'GET',
    endpoint: joinEndpoint(source.uri, 'v2/entities'),
    entityType: source.query.type,
    attributes: [...source.query.select],
    capabilities: ['geo-filter', 'time-range'],
    filters: [...filters],
    params: {
      type: source.query.type,
      attrs: source.query.select.join(','),
      options: 'keyValues',
    },
  }),
};
