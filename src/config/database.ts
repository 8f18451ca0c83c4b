import { createClient, SupabaseClient } from '@supabase/supabase-js';
import { logger } from './logger';
import { env } from './environment';
import type { ReservationStore } from '../repositories/store.types';
import { InMemoryReservationStore } from '../repositories/memory.store';
import { SupabaseReservationStore } from '../repositories/supabase.store';

// Singleton instances
let supabaseClient: SupabaseClient | null = null;
let reservationStore: ReservationStore | null = null;

/**
 * Get or create Supabase client instance (singleton pattern)
 *
 * Configuration:
 * - Uses service role key for admin access (bypasses RLS)
 * - Disables auth (identities are resolved upstream)
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
 * Get or create the reservation store selected by STORE_DRIVER
 */
export const getReservationStore = (): ReservationStore => {
  if (!reservationStore) {
    reservationStore =
      env.STORE_DRIVER === 'supabase'
        ? new SupabaseReservationStore(getSupabaseClient(), {
            commitRetries: env.STORE_COMMIT_RETRIES,
          })
        : new InMemoryReservationStore();

    logger.info('Reservation store initialized', { driver: reservationStore.driver });
  }

  return reservationStore;
};

/**
 * Test store connection
 *
 * @returns Promise<boolean> - true if the store answers
 */
export const testConnection = async (): Promise<boolean> => {
  try {
    const ok = await getReservationStore().ping();

    if (!ok) {
      logger.error('Store connection test failed');
      return false;
    }

    logger.info('Store connection test successful');
    return true;
  } catch (error) {
    logger.error('Store connection test failed', { error });
    return false;
  }
};

/**
 * Drop singletons (for graceful shutdown)
 */
export const closeConnection = (): void => {
  supabaseClient = null;
  reservationStore = null;
  logger.info('Store connection closed');
};
