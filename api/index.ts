// Filename: api/index.ts

import type { VercelRequest, VercelResponse } from '@vercel/node';
import { routeRequest } from './routing.js';

/**
 * Single entry for hosts that mount one function; see routing.ts for the query switches.
 */
export default async function handler(req: VercelRequest, res: VercelResponse): Promise<void> {
  await routeRequest(req, res);
}
