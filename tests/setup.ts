/**
 * Jest Test Setup
 * Loads test environment variables and keeps the global logger quiet
 */

import * as dotenv from 'dotenv';

// Load test environment variables
dotenv.config({ path: '.env.test' });

process.env.LOG_LEVEL = process.env.LOG_LEVEL || 'error';
process.env.ENABLE_FILE_LOGGING = 'false';

jest.setTimeout(30000);
