// Filename: api/projects.ts
/**
 * Lists the project slugs the metrics API knows about.
 */
import type { VercelRequest, VercelResponse } from '@vercel/node';
import { getServices } from '../core/services.js';
import { handleApiError } from '../utils/apiErrors.js';

export default async function handler(req: VercelRequest, res: VercelResponse) {
  if (req.method !== 'GET') {
    return res.status(405).json({ error: 'Method not allowed' });
  }

  try {
    const slugs = await getServices().source.listProjectSlugs();
    res.setHeader('Cache-Control', 'public, max-age=3600');
    return res.status(200).json({ slugs });
  } catch (error) {
    handleApiError(error, res, 'project slugs');
  }
}
