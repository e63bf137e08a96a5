// Filename: api/routing.ts

import type { VercelRequest, VercelResponse } from '@vercel/node';
import derivativesHandler from './derivatives.js';
import projectsHandler from './projects.js';

/**
 * Routes requests based on query parameters
 * - ?projects -> Project slug list
 * - ?metric=… -> Derivative metrics
 * - (none)    -> Endpoint overview
 */
export async function routeRequest(req: VercelRequest, res: VercelResponse): Promise<void> {
  if (req.query.projects !== undefined) {
    await projectsHandler(req, res);
    return;
  }
  if (req.query.metric !== undefined) {
    await derivativesHandler(req, res);
    return;
  }

  res.status(200).json({
    endpoints: {
      '/api/derivatives': 'GET ?metric&slug&from&to[&interval&change&ma&maChange&minPeriods&format]',
      '/api/projects': 'GET',
    },
  });
}
