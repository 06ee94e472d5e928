import type { ConfigStore } from '../infra/store/ConfigStore.js';
import {
  createConfigHistory,
  type ConfigOperation,
  type ConfigType,
} from '../domain/entities/ConfigHistory.js';
import { describeError, logger } from '../infra/logger.js';

/**
 * Who is making a change; operator is free text and may be absent
 */
export interface OperationContext {
  operator?: string | null;
}

/**
 * AuditRecorder - writes one history row per successful mutation
 *
 * Runs after the mutation has committed. A failed write is logged and
 * dropped; it is not retried and does not fail the caller.
 */
export class AuditRecorder {
  constructor(private store: ConfigStore) {}

  async record(params: {
    configType: ConfigType;
    configId: number | null;
    operation: ConfigOperation;
    before: unknown;
    after: unknown;
    context: OperationContext;
  }): Promise<void> {
    try {
      const entry = createConfigHistory({
        configType: params.configType,
        configId: params.configId,
        operation: params.operation,
        oldValue: params.before,
        newValue: params.after,
        operator: params.context.operator,
      });
      await this.store.createHistory(entry);

      logger.debug('Config change recorded', {
        configType: params.configType,
        configId: params.configId,
        operation: params.operation,
      });
    } catch (error) {
      // Mutation already committed
      logger.warn('Failed to record config history', {
        configType: params.configType,
        configId: params.configId,
        operation: params.operation,
        ...describeError(error),
      });
    }
  }
}
