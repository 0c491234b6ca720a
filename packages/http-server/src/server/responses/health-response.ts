/**
 * Health check response shared by the Express routes
 */

export interface HealthResponse {
  status: string;
  timestamp: string;
  service: string;
  version: string;
  node_version: string;
  environment: string;
  performance: {
    uptime_seconds: number;
    memory_usage: NodeJS.MemoryUsage;
  };
  storage?: {
    sessions: string;
    linkages: string;
  };
}

export interface HealthResponseOptions {
  service: string;
  storage?: HealthResponse['storage'];
}

export function buildHealthResponse(options: HealthResponseOptions): HealthResponse {
  const response: HealthResponse = {
    status: 'healthy',
    timestamp: new Date().toISOString(),
    service: options.service,
    version: process.env.npm_package_version || '1.0.0',
    node_version: process.version,
    environment: process.env.NODE_ENV || 'development',
    performance: {
      uptime_seconds: process.uptime(),
      memory_usage: process.memoryUsage(),
    },
  };

  if (options.storage) {
    response.storage = options.storage;
  }

  return response;
}
