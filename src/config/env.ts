import dotenv from 'dotenv';
dotenv.config();

export const ENV = {
  SUPABASE_URL: process.env.SUPABASE_URL || '',
  SUPABASE_SERVICE_KEY: process.env.SUPABASE_SERVICE_KEY || '',

  HEADLESS: process.env.HEADLESS !== 'false',
  BASE_URL: process.env.BASE_URL || 'https://www.whoscored.com',

  MATCH_DELAY_MS: parseInt(process.env.MATCH_DELAY_MS || '2000', 10),
  RENDER_DELAY_MS: parseInt(process.env.RENDER_DELAY_MS || '5000', 10),
  PAGINATION_DELAY_MS: parseInt(process.env.PAGINATION_DELAY_MS || '2000', 10),
  PAGE_TIMEOUT_MS: parseInt(process.env.PAGE_TIMEOUT_MS || '30000', 10),
  MATCH_TIMEOUT_MS: parseInt(process.env.MATCH_TIMEOUT_MS || '120000', 10),

  MAX_RETRIES: parseInt(process.env.MAX_RETRIES || '2', 10),
  RETRY_DELAY_MS: parseInt(process.env.RETRY_DELAY_MS || '5000', 10),

  // Title the listing puts on the "previous" control once history runs out.
  // Site copy, so it lives here rather than in the navigator.
  NO_DATA_TITLE: process.env.NO_DATA_TITLE || 'No data for previous week',
  MAX_LISTING_PAGES: parseInt(process.env.MAX_LISTING_PAGES || '240', 10),

  LOG_LEVEL: process.env.LOG_LEVEL || 'info',
};

export function validateEnv(): void {
  if (!ENV.SUPABASE_URL || !ENV.SUPABASE_SERVICE_KEY) {
    throw new Error('Missing SUPABASE_URL or SUPABASE_SERVICE_KEY in .env');
  }
}
