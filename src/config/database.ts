import { createClient, SupabaseClient } from '@supabase/supabase-js';
import { logger } from './logger';
import { env } from './environment';

// Singleton Supabase client instance
let supabaseClient: SupabaseClient | null = null;

/**
 * Get or create Supabase client instance (singleton pattern)
 *
 * Uses the service role key and disables auth sessions: the API is the only
 * writer and talks to the listings table directly.
 */
export const getSupabaseClient = (): SupabaseClient => {
  if (!supabaseClient) {
    if (!env.SUPABASE_URL || !env.SUPABASE_SERVICE_ROLE_KEY) {
      throw new Error('Supabase is not configured (SUPABASE_URL / SUPABASE_SERVICE_ROLE_KEY)');
    }

    supabaseClient = createClient(env.SUPABASE_URL, env.SUPABASE_SERVICE_ROLE_KEY, {
      auth: {
        autoRefreshToken: false,
        persistSession: false,
      },
      db: {
        schema: 'public',
      },
    });

    logger.info('Supabase client initialized', {
      url: env.SUPABASE_URL,
      schema: 'public',
    });
  }

  return supabaseClient;
};

/**
 * Test database connection
 *
 * @returns true if the listings table is reachable
 */
export const testConnection = async (): Promise<boolean> => {
  try {
    const client = getSupabaseClient();

    const { error } = await client.from(env.SUPABASE_LISTINGS_TABLE).select('id').limit(1);

    if (error) {
      logger.error('Database connection test failed', { error: error.message });
      return false;
    }

    logger.info('Database connection test successful');
    return true;
  } catch (error) {
    logger.error('Database connection test failed', { error });
    return false;
  }
};

/**
 * Close database connection (for graceful shutdown)
 */
export const closeConnection = (): void => {
  if (supabaseClient) {
    // Connection pooling is managed by Supabase
    supabaseClient = null;
    logger.info('Supabase client connection closed');
  }
};
