/**
 * Health Routes
 *
 * Provides server health monitoring for load balancers and uptime checks
 */

import { Router, Request, Response } from 'express';
import { buildHealthResponse, type HealthResponse } from '../responses/health-response.js';

export interface HealthRoutesOptions {
  serviceName: string;
  storage?: HealthResponse['storage'];
}

/**
 * Setup health routes
 *
 * @param router - Express router to attach routes to
 */
export function setupHealthRoutes(router: Router, options: HealthRoutesOptions): void {
  router.get('/health', (_req: Request, res: Response) => {
    res.json(buildHealthResponse({ service: options.serviceName, storage: options.storage }));
  });
}
