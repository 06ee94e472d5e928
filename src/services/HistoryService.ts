import type { ConfigStore } from '../infra/store/ConfigStore.js';
import type { ConfigHistory, ConfigType } from '../domain/entities/ConfigHistory.js';
import { resolvePagination } from '../domain/pagination.js';

export interface HistoryResult {
  items: ConfigHistory[];
  total: number;
  limit: number;
  offset: number;
}

export class HistoryService {
  constructor(private store: ConfigStore) {}

  async listHistory(params: {
    configType?: ConfigType;
    configId?: number;
    limit?: number;
    offset?: number;
  }): Promise<HistoryResult> {
    const { limit, offset } = resolvePagination(params);
    const page = await this.store.getHistory({
      configType: params.configType,
      configId: params.configId,
      limit,
      offset,
    });
    return { items: page.items, total: page.total, limit, offset };
  }
}
