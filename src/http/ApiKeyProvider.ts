import { CredentialStore } from './CredentialStore';
import LibLogger from '../logger';

const logger = LibLogger.get('ApiKeyProvider');

export const API_KEY_CREDENTIAL = 'catalog.apiKey';

const API_KEY_PATTERN = /^[A-Za-z0-9]{32,}$/;

export const isValidApiKey = (key: string): boolean => API_KEY_PATTERN.test(key);

/**
 * Resolves the catalog API key: memoised value, then the credential store, then the
 * plaintext fallback from configuration. A fallback key is migrated into the store the
 * first time it is used.
 */
export class ApiKeyProvider {
  private cached: string | null = null;

  public constructor(
    private readonly store: CredentialStore,
    private readonly fallbackKey?: string
  ) { }

  public async getApiKey(): Promise<string | null> {
    if (this.cached) {
      return this.cached;
    }

    const stored = await this.store.get(API_KEY_CREDENTIAL);
    if (stored) {
      this.cached = stored;
      return stored;
    }

    const fallback = this.fallbackKey?.trim();
    if (!fallback) {
      return null;
    }

    try {
      await this.store.set(API_KEY_CREDENTIAL, fallback);
      logger.info('Migrated plaintext API key into the credential store');
    } catch (error) {
      // The key is still usable for this process even when it cannot be stored
      logger.warning('Failed to migrate API key into the credential store', { error });
    }
    this.cached = fallback;
    return fallback;
  }

  public async isConfigured(): Promise<boolean> {
    return (await this.getApiKey()) !== null;
  }

  /**
   * Store a user-provided key. Keys are at least 32 alphanumeric characters.
   */
  public async setApiKey(key: string): Promise<void> {
    const trimmed = key.trim();
    if (!isValidApiKey(trimmed)) {
      throw new Error('API key must be at least 32 alphanumeric characters');
    }
    await this.store.set(API_KEY_CREDENTIAL, trimmed);
    this.cached = trimmed;
  }

  public async clearApiKey(): Promise<void> {
    await this.store.delete(API_KEY_CREDENTIAL);
    this.cached = null;
  }
}
