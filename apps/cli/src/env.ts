/**
 * Imported first by the entry point so .env values are in process.env before
 * any package creates its logger
 */

import { initEnv } from '@kexp/config';

export const envResult = initEnv();
