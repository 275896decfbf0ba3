import type { SupabaseClient } from '@supabase/supabase-js';
import type { Database, Payment, PaymentInsert, PaymentUpdate } from '@payhub/database';
import { BaseRepository } from './base.repository';

/**
 * Repository for the local PayPal payments ledger
 */
export class PaymentRepository extends BaseRepository<Payment, PaymentInsert, PaymentUpdate> {
  constructor(supabase: SupabaseClient<Database>) {
    super(supabase, 'paypal_payments');
  }

  async findByPayPalOrderId(orderId: string): Promise<Payment | null> {
    return this.findOneBy('paypal_order_id', orderId);
  }

  /**
   * Newest ledger row carrying the caller's order reference
   */
  async findByOrderReference(reference: string): Promise<Payment | null> {
    return this.findFirst('order_reference', reference, false);
  }

  /**
   * Capture ids are matched case-insensitively
   */
  async findByCaptureId(captureId: string): Promise<Payment | null> {
    return this.findFirst('capture_id', captureId, true);
  }

  private async findFirst(
    column: string,
    value: string,
    caseInsensitive: boolean
  ): Promise<Payment | null> {
    const base = this.supabase.from('paypal_payments').select('*');
    const query = caseInsensitive ? base.ilike(column, value) : base.eq(column, value);

    const { data, error } = await query.order('created_at', { ascending: false }).limit(1);

    if (error) {
      throw new Error(`Failed to find paypal_payments by ${column}: ${error.message}`);
    }

    const rows = (data ?? []) as Payment[];
    return rows[0] ?? null;
  }
}

