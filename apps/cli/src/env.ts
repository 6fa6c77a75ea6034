/**
 * Loads `.env` before anything reads process.env.
 * Imported first by the entry point; the logger reads LOG_LEVEL on load.
 */

import { config as dotenvConfig } from 'dotenv';
import { resolve } from 'node:path';

dotenvConfig({ path: resolve(process.cwd(), '.env') });
