/**
 * Side-effect import: load .env.local first, then fall back to .env.
 * Must be the first import of every script so env is set before the logger
 * and config modules read it.
 */

import dotenv from 'dotenv';
import { resolve } from 'path';

dotenv.config({ path: resolve(process.cwd(), '.env.local') });
dotenv.config();
