import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { addHours } from 'date-fns';
import { config } from './config';
import { InvalidInputError } from './errors';
import { Logger } from './logger';
import { parseCandidateRow } from './validation';
import type { CandidatePoolProvider, CandidateQuery } from './candidate-pool';
import type { BetCandidate } from '../types/candidate';

const supabaseKey = config.supabaseServiceRoleKey || config.supabaseAnonKey;

// Only create a Supabase client if we have the required keys
export const supabase: SupabaseClient | null = config.supabaseUrl && supabaseKey
  ? createClient(
      config.supabaseUrl,
      supabaseKey,
      {
        auth: {
          autoRefreshToken: false,
          persistSession: false,
        },
      }
    )
  : null;

/**
 * Reads upcoming candidates from the `bet_candidates` table. Rows that fail
 * validation are logged and skipped; a query error fails the whole fetch.
 */
export class SupabaseCandidatePoolProvider implements CandidatePoolProvider {
  private logger = new Logger('supabase');

  constructor(
    private readonly client: SupabaseClient | null = supabase,
    private readonly table: string = config.candidatesTable
  ) {}

  async fetchCandidates(query: CandidateQuery): Promise<BetCandidate[]> {
    if (!this.client) {
      throw new Error('Supabase is not configured: set SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY or SUPABASE_ANON_KEY');
    }

    let request = this.client
      .from(this.table)
      .select('*')
      .gt('event_start_time', query.now.toISOString())
      .lte('event_start_time', addHours(query.now, query.windowDays * 24).toISOString());

    if (query.sport) {
      request = request.eq('sport', query.sport);
    }

    const { data, error } = await request.order('event_start_time', { ascending: true });

    if (error) {
      this.logger.error(`Failed to fetch candidates from ${this.table}`, error.message);
      throw new Error(`Failed to fetch candidates: ${error.message}`);
    }

    const rows: unknown[] = data ?? [];
    const candidates: BetCandidate[] = [];

    for (const row of rows) {
      try {
        candidates.push(parseCandidateRow(row));
      } catch (parseError) {
        if (!(parseError instanceof InvalidInputError)) throw parseError;
        this.logger.warn(`Skipping ${this.table} row: ${parseError.message}`, { field: parseError.field });
      }
    }

    this.logger.info(`Fetched ${candidates.length}/${rows.length} candidates${query.sport ? ` for ${query.sport}` : ''}`);
    return candidates;
  }
}
