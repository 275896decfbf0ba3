/**
 * Database types for the payhub PayPal integration
 * These types are derived from the Supabase schema in supabase/migrations
 */

import type { PayPalMode } from './modes';

export type Json = string | number | boolean | null | { [key: string]: Json | undefined } | Json[];

export type PaymentStatus = 'PENDING' | 'COMPLETED' | 'DENIED' | 'REFUNDED';

export interface Database {
  public: {
    Tables: {
      paypal_configs: {
        Row: {
          id: string;
          name: string;
          client_id: string;
          client_secret: string;
          mode: PayPalMode;
          is_active: boolean;
          created_at: string;
          updated_at: string;
        };
        Insert: {
          id?: string;
          name: string;
          client_id: string;
          client_secret: string;
          mode?: PayPalMode;
          is_active?: boolean;
          created_at?: string;
          updated_at?: string;
        };
        Update: {
          id?: string;
          name?: string;
          client_id?: string;
          client_secret?: string;
          mode?: PayPalMode;
          is_active?: boolean;
          created_at?: string;
          updated_at?: string;
        };
        Relationships: [];
      };
      paypal_webhook_events: {
        Row: {
          id: string;
          event_id: string;
          event_type: string;
          resource_type: string;
          resource_id: string;
          summary: string;
          raw_data: Json;
          processed: boolean;
          processed_at: string | null;
          created_at: string;
        };
        Insert: {
          id?: string;
          event_id: string;
          event_type: string;
          resource_type?: string;
          resource_id?: string;
          summary?: string;
          raw_data: Json;
          processed?: boolean;
          processed_at?: string | null;
          created_at?: string;
        };
        Update: {
          id?: string;
          event_id?: string;
          event_type?: string;
          resource_type?: string;
          resource_id?: string;
          summary?: string;
          raw_data?: Json;
          processed?: boolean;
          processed_at?: string | null;
          created_at?: string;
        };
        Relationships: [];
      };
      paypal_webhook_endpoints: {
        Row: {
          id: string;
          name: string;
          url: string;
          events: string[];
          webhook_id: string;
          is_active: boolean;
          created_at: string;
          updated_at: string;
        };
        Insert: {
          id?: string;
          name: string;
          url: string;
          events?: string[];
          webhook_id: string;
          is_active?: boolean;
          created_at?: string;
          updated_at?: string;
        };
        Update: {
          id?: string;
          name?: string;
          url?: string;
          events?: string[];
          webhook_id?: string;
          is_active?: boolean;
          created_at?: string;
          updated_at?: string;
        };
        Relationships: [];
      };
      paypal_payments: {
        Row: {
          id: string;
          paypal_order_id: string;
          order_reference: string | null;
          capture_id: string | null;
          status: PaymentStatus;
          amount: number | null;
          paid_amount: number | null;
          currency_code: string | null;
          created_at: string;
          updated_at: string;
        };
        Insert: {
          id?: string;
          paypal_order_id: string;
          order_reference?: string | null;
          capture_id?: string | null;
          status?: PaymentStatus;
          amount?: number | null;
          paid_amount?: number | null;
          currency_code?: string | null;
          created_at?: string;
          updated_at?: string;
        };
        Update: {
          id?: string;
          paypal_order_id?: string;
          order_reference?: string | null;
          capture_id?: string | null;
          status?: PaymentStatus;
          amount?: number | null;
          paid_amount?: number | null;
          currency_code?: string | null;
          created_at?: string;
          updated_at?: string;
        };
        Relationships: [];
      };
    };
    Views: Record<string, never>;
    Functions: Record<string, never>;
    Enums: Record<string, never>;
    CompositeTypes: Record<string, never>;
  };
}

type PublicTables = Database['public']['Tables'];

export type Tables<T extends keyof PublicTables> = PublicTables[T]['Row'];
export type TablesInsert<T extends keyof PublicTables> = PublicTables[T]['Insert'];
export type TablesUpdate<T extends keyof PublicTables> = PublicTables[T]['Update'];
