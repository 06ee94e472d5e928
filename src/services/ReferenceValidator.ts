import type { ConfigStore } from '../infra/store/ConfigStore.js';
import type { Backend } from '../domain/entities/Backend.js';
import { InvalidReferenceError } from '../domain/errors.js';

/**
 * Checks that a route points at a backend that exists and is enabled.
 * This is a read followed later by a separate write, so a backend disabled
 * in between is not caught.
 */
export class ReferenceValidator {
  constructor(private store: ConfigStore) {}

  async assertUsableBackend(backendName: string): Promise<Backend> {
    const backend = await this.store.getBackendByName(backendName);
    if (!backend || !backend.enabled) {
      throw new InvalidReferenceError(backendName);
    }
    return backend;
  }
}
