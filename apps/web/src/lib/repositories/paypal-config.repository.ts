import type { SupabaseClient } from '@supabase/supabase-js';
import type {
  Database,
  PayPalConfig,
  PayPalConfigInsert,
  PayPalConfigUpdate,
  PayPalMode,
} from '@payhub/database';
import {
  BaseRepository,
  OrderingOption,
  PaginatedResult,
  PaginationOptions,
} from './base.repository';

export const CONFIG_ORDERING_COLUMNS = ['name', 'created_at', 'updated_at'] as const;
export type ConfigOrderingColumn = (typeof CONFIG_ORDERING_COLUMNS)[number];

export interface PayPalConfigFilters {
  mode?: PayPalMode;
  isActive?: boolean;
  name?: string;
  search?: string;
  ordering?: OrderingOption<ConfigOrderingColumn>;
}

const DEFAULT_ORDERING: OrderingOption<ConfigOrderingColumn> = {
  column: 'created_at',
  ascending: false,
};

/**
 * Repository for PayPal configurations.
 * Rows hold ciphertext only; encryption happens in PayPalCredentialService.
 */
export class PayPalConfigRepository extends BaseRepository<
  PayPalConfig,
  PayPalConfigInsert,
  PayPalConfigUpdate
> {
  constructor(supabase: SupabaseClient<Database>) {
    super(supabase, 'paypal_configs');
  }

  async findByName(name: string): Promise<PayPalConfig | null> {
    return this.findOneBy('name', name);
  }

  /**
   * Newest active configuration, optionally restricted to a name
   */
  async findActive(name?: string): Promise<PayPalConfig | null> {
    let query = this.supabase.from('paypal_configs').select('*').eq('is_active', true);

    if (name) {
      query = query.eq('name', name);
    }

    const { data, error } = await query.order('created_at', { ascending: false }).limit(1);

    if (error) {
      throw new Error(`Failed to find active paypal_configs: ${error.message}`);
    }

    const rows = (data ?? []) as PayPalConfig[];
    return rows[0] ?? null;
  }

  /**
   * List configurations with filters, ordering and pagination
   */
  async findAllFiltered(
    filters: PayPalConfigFilters = {},
    options?: PaginationOptions
  ): Promise<PaginatedResult<PayPalConfig>> {
    const { from, to, page, pageSize } = this.pageBounds(options);
    const ordering = filters.ordering ?? DEFAULT_ORDERING;

    let query = this.supabase.from('paypal_configs').select('*', { count: 'exact' });

    if (filters.mode) {
      query = query.eq('mode', filters.mode);
    }

    if (filters.isActive !== undefined) {
      query = query.eq('is_active', filters.isActive);
    }

    if (filters.name) {
      query = query.eq('name', filters.name);
    }

    if (filters.search) {
      query = query.ilike('name', `%${filters.search}%`);
    }

    const { data, count, error } = await query
      .order(ordering.column, { ascending: ordering.ascending })
      .range(from, to);

    if (error) {
      throw new Error(`Failed to list paypal_configs: ${error.message}`);
    }

    return this.toPage((data ?? []) as PayPalConfig[], count, page, pageSize);
  }

  /**
   * Insert or replace the configuration with the given name
   */
  async upsertByName(input: PayPalConfigInsert): Promise<PayPalConfig> {
    const { data, error } = await this.supabase
      .from('paypal_configs')
      .upsert(input, { onConflict: 'name' })
      .select()
      .single();

    if (error) {
      throw new Error(`Failed to save paypal_configs: ${error.message}`);
    }

    return data as PayPalConfig;
  }

  /**
   * Delete by name, returning whether a row was removed
   */
  async deleteByName(name: string): Promise<boolean> {
    const { data, error } = await this.supabase
      .from('paypal_configs')
      .delete()
      .eq('name', name)
      .select('id');

    if (error) {
      throw new Error(`Failed to delete paypal_configs: ${error.message}`);
    }

    return ((data ?? []) as Array<{ id: string }>).length > 0;
  }

  /**
   * Make one configuration the only active one
   */
  async activateExclusively(id: string): Promise<PayPalConfig> {
    const { error } = await this.supabase
      .from('paypal_configs')
      .update({ is_active: false })
      .neq('id', id);

    if (error) {
      throw new Error(`Failed to deactivate paypal_configs: ${error.message}`);
    }

    return this.update(id, { is_active: true });
  }

  /**
   * Set is_active on many rows, returning the number of rows changed
   */
  async setActiveFlag(ids: string[], isActive: boolean): Promise<number> {
    if (ids.length === 0) {
      return 0;
    }

    const { data, error } = await this.supabase
      .from('paypal_configs')
      .update({ is_active: isActive })
      .in('id', ids)
      .select('id');

    if (error) {
      throw new Error(`Failed to update paypal_configs: ${error.message}`);
    }

    return ((data ?? []) as Array<{ id: string }>).length;
  }
}
