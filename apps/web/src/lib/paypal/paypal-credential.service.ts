/**
 * PayPal Credential Service
 *
 * Stores PayPal REST credentials encrypted at rest and hands out the
 * decrypted pair for API calls. Both client id and secret are encrypted.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { Database, PayPalConfig, PayPalMode } from '@payhub/database';
import { DEFAULT_PAYPAL_MODE, getApiBaseUrl } from '@payhub/database';
import { encrypt, decrypt, looksEncrypted } from '@/lib/crypto';
import {
  PayPalConfigRepository,
  type PayPalConfigFilters,
  type PaginatedResult,
  type PaginationOptions,
} from '@/lib/repositories';
import { ConfigurationNotFoundError, PayPalConfigurationError } from './types';
import type { PayPalCredentials } from './types';

export interface StoreCredentialsInput {
  name: string;
  clientId: string;
  clientSecret: string;
  mode?: PayPalMode;
}

export interface UpdateCredentialsInput {
  clientId?: string;
  clientSecret?: string;
  mode?: PayPalMode;
}

export class PayPalCredentialService {
  private repository: PayPalConfigRepository;

  constructor(supabase: SupabaseClient<Database>) {
    this.repository = new PayPalConfigRepository(supabase);
  }

  /**
   * Encrypt and save credentials under a name, replacing any existing row.
   * The saved configuration is always active.
   */
  async storeCredentials(input: StoreCredentialsInput): Promise<PayPalConfig> {
    const [clientId, clientSecret] = await Promise.all([
      encrypt(input.clientId),
      encrypt(input.clientSecret),
    ]);

    return this.repository.upsertByName({
      name: input.name,
      client_id: clientId,
      client_secret: clientSecret,
      mode: input.mode ?? DEFAULT_PAYPAL_MODE,
      is_active: true,
    });
  }

  /**
   * Decrypted credentials of the named active configuration,
   * or of the newest active one when no name is given
   */
  async getCredentials(name?: string): Promise<PayPalCredentials> {
    const config = await this.repository.findActive(name);

    if (!config) {
      throw new PayPalConfigurationError();
    }

    return this.decryptConfig(config);
  }

  /**
   * Decrypted credentials of a configuration regardless of its active flag
   */
  async getCredentialsById(id: string): Promise<PayPalCredentials> {
    const config = await this.repository.findById(id);

    if (!config) {
      throw new ConfigurationNotFoundError(id);
    }

    return this.decryptConfig(config);
  }

  /**
   * Change only the supplied fields; empty strings are ignored
   */
  async updateCredentials(name: string, input: UpdateCredentialsInput): Promise<PayPalConfig> {
    const config = await this.repository.findByName(name);

    if (!config) {
      throw new ConfigurationNotFoundError(name);
    }

    const changes: Database['public']['Tables']['paypal_configs']['Update'] = {};

    if (input.clientId) {
      changes.client_id = await encrypt(input.clientId);
    }

    if (input.clientSecret) {
      changes.client_secret = await encrypt(input.clientSecret);
    }

    if (input.mode) {
      changes.mode = input.mode;
    }

    if (Object.keys(changes).length === 0) {
      return config;
    }

    return this.repository.update(config.id, changes);
  }

  async deleteCredentials(name: string): Promise<boolean> {
    return this.repository.deleteByName(name);
  }

  async listConfigurations(
    filters?: PayPalConfigFilters,
    pagination?: PaginationOptions
  ): Promise<PaginatedResult<PayPalConfig>> {
    return this.repository.findAllFiltered(filters, pagination);
  }

  async getConfiguration(id: string): Promise<PayPalConfig | null> {
    return this.repository.findById(id);
  }

  async getActiveConfiguration(): Promise<PayPalConfig | null> {
    return this.repository.findActive();
  }

  /**
   * Make the named configuration the only active one.
   * Nothing changes when the name is unknown.
   */
  async setActiveConfiguration(name: string): Promise<PayPalConfig> {
    const config = await this.repository.findByName(name);

    if (!config) {
      throw new ConfigurationNotFoundError(name);
    }

    return this.repository.activateExclusively(config.id);
  }

  async setActiveFlag(ids: string[], isActive: boolean): Promise<number> {
    return this.repository.setActiveFlag(ids, isActive);
  }

  async hasConfiguration(name: string): Promise<boolean> {
    const config = await this.repository.findByName(name);
    return config !== null;
  }

  private async decryptConfig(config: PayPalConfig): Promise<PayPalCredentials> {
    const stored = [config.client_id, config.client_secret];
    if (stored.some((value) => !looksEncrypted(value))) {
      throw new PayPalConfigurationError(
        `Stored credentials for '${config.name}' are not encrypted. Save them again.`
      );
    }

    try {
      const [clientId, clientSecret] = await Promise.all([
        decrypt(config.client_id),
        decrypt(config.client_secret),
      ]);

      return {
        configId: config.id,
        name: config.name,
        clientId,
        clientSecret,
        mode: config.mode,
        apiBaseUrl: getApiBaseUrl(config.mode),
      };
    } catch (error) {
      console.error(`[PayPalCredentialService] Failed to decrypt configuration ${config.name}:`, error);
      throw new PayPalConfigurationError(
        `Stored credentials for '${config.name}' could not be decrypted.`
      );
    }
  }
}
