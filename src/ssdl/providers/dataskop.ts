import type { DataSource, DataskopQueryPlan, QueryFilterSlot } from '../../kernel/types.js';
import type { ProviderStrategy } from '../provider-registry.js';
import { joinEndpoint } from './endpoint.js';

export const dataskopProviderStrategy: ProviderStrategy = {
  provider: 'Dataskop',
  dialect: 'dataskop-rest',
  capabilities: ['time-range'],
  compile: (source: DataSource, filters: readonly QueryFilterSlot[]): DataskopQueryPlan => ({
    provider: source.provider,
    dialect: 'dataskop-rest',
    method: 'GET',
    endpoint: joinEndpoint(source.uri, 'api/v1/measurements'),
    entityType: source.query.type,
    attributes: [...source.query.select],
    capabilities: ['time-range'],
    filters: [...filters],
    params: {
      entityType: source.query.type,
      fields: source.query.select.join(','),
    },
  }),
};
