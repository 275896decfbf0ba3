import type { SupabaseClient } from '@supabase/supabase-js';
import type { Database } from '@payhub/database';

export interface PaginationOptions {
  page?: number;
  pageSize?: number;
}

export interface PaginatedResult<T> {
  data: T[];
  total: number;
  page: number;
  pageSize: number;
  totalPages: number;
}

/**
 * Column ordering, e.g. { column: 'created_at', ascending: false }
 */
export interface OrderingOption<TColumn extends string = string> {
  column: TColumn;
  ascending: boolean;
}

export type PayHubTable = keyof Database['public']['Tables'];

const DEFAULT_PAGE_SIZE = 50;

// Table names are chosen at run time, which the typed client cannot infer
// eslint-disable-next-line @typescript-eslint/no-explicit-any
type AnySupabaseClient = SupabaseClient<any>;

/**
 * Shared lookups and writes for the payhub tables. Subclasses add the
 * table-specific queries.
 */
export abstract class BaseRepository<TRow, TInsert, TUpdate> {
  protected readonly tableName: PayHubTable;
  protected readonly supabase: AnySupabaseClient;

  constructor(supabase: SupabaseClient<Database>, tableName: PayHubTable) {
    this.supabase = supabase as AnySupabaseClient;
    this.tableName = tableName;
  }

  async findById(id: string): Promise<TRow | null> {
    return this.findOneBy('id', id);
  }

  /**
   * Look a row up by a unique column; null when there is none
   */
  protected async findOneBy(column: string, value: string): Promise<TRow | null> {
    const { data, error } = await this.supabase
      .from(this.tableName)
      .select('*')
      .eq(column, value)
      .single();

    if (error) {
      if (error.code === 'PGRST116') {
        return null;
      }
      throw new Error(`Failed to find ${this.tableName} by ${column}: ${error.message}`);
    }

    return data as TRow;
  }

  async create(input: TInsert): Promise<TRow> {
    const { data, error } = await this.supabase
      .from(this.tableName)
      .insert(input)
      .select()
      .single();

    if (error) {
      throw new Error(`Failed to create ${this.tableName}: ${error.message}`);
    }

    return data as TRow;
  }

  async update(id: string, input: TUpdate): Promise<TRow> {
    const { data, error } = await this.supabase
      .from(this.tableName)
      .update(input)
      .eq('id', id)
      .select()
      .single();

    if (error) {
      throw new Error(`Failed to update ${this.tableName}: ${error.message}`);
    }

    return data as TRow;
  }

  /**
   * Inclusive row range for a page; pages start at 1
   */
  protected pageBounds(options?: PaginationOptions) {
    const page = options?.page ?? 1;
    const pageSize = options?.pageSize ?? DEFAULT_PAGE_SIZE;
    const from = (page - 1) * pageSize;
    return { from, to: from + pageSize - 1, page, pageSize };
  }

  protected toPage(
    data: TRow[],
    count: number | null,
    page: number,
    pageSize: number
  ): PaginatedResult<TRow> {
    const total = count ?? 0;
    return {
      data,
      total,
      page,
      pageSize,
      totalPages: Math.ceil(total / pageSize),
    };
  }
}
