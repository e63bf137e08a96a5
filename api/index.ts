// Filename: api/index.ts
import type { VercelRequest, VercelResponse } from '@vercel/node';
import { routeRequest } from './routing.js';

/** Single entry point; see routing.ts for the query-based dispatch. */
export default async function handler(req: VercelRequest, res: VercelResponse): Promise<void> {
  await routeRequest(req, res);
}
