import { createClient, SupabaseClient } from '@supabase/supabase-js';
import { logger } from './logger';
import { env } from './environment';

// Tables the ledger reads through PostgREST
const LEDGER_TABLES = ['items', 'receipts', 'receipt_lines'] as const;

let supabaseClient: SupabaseClient | null = null;

/**
 * Lazily created service-role client. The ledger calls `apply_pos_operations`
 * and `next_receipt_no`, which are not exposed to anonymous clients.
 */
export const getSupabaseClient = (): SupabaseClient => {
  if (supabaseClient) return supabaseClient;

  const url = env.SUPABASE_URL;
  const key = env.SUPABASE_SERVICE_ROLE_KEY;
  if (!url || !key) {
    throw new Error('Supabase is not configured (SUPABASE_URL / SUPABASE_SERVICE_ROLE_KEY)');
  }

  supabaseClient = createClient(url, key, {
    auth: { autoRefreshToken: false, persistSession: false },
    db: { schema: 'public' },
  });
  logger.info('Supabase client initialized', { url });

  return supabaseClient;
};

/**
 * Check that every ledger table is reachable (startup probe)
 */
export const testConnection = async (): Promise<boolean> => {
  const client = getSupabaseClient();

  for (const table of LEDGER_TABLES) {
    const { error } = await client.from(table).select('*', { count: 'exact', head: true });
    if (error) {
      logger.error('Ledger table unreachable', { table, error: error.message });
      return false;
    }
  }

  logger.info('Ledger schema reachable', { tables: LEDGER_TABLES });
  return true;
};

/**
 * Forget the cached client on shutdown
 */
export const closeConnection = (): void => {
  if (!supabaseClient) return;
  supabaseClient = null;
  logger.info('Supabase client released');
};
