/**
 * Jest Setup File
 *
 * Loads environment variables from .env and keeps provider logging quiet
 * unless a test run asks for it.
 */

import * as dotenv from 'dotenv';
import * as path from 'path';

dotenv.config({ path: path.join(__dirname, '..', '.env') });

if (!process.env.IMAGEGEN_LOG_LEVEL) {
  process.env.IMAGEGEN_LOG_LEVEL = 'silent';
}
