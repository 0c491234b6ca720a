/**
 * Observability configuration with environment detection
 */

export interface ObservabilityConfig {
  enabled: boolean;
  environment: 'development' | 'production' | 'test';
  sampling: {
    metrics: boolean;
  };
  exporters: {
    console: boolean;
  };
  service: {
    name: string;
    version: string;
  };
}

/**
 * Detect deployment environment
 */
export function detectEnvironment(): 'development' | 'production' | 'test' {
  if (process.env.NODE_ENV === 'test') {
    return 'test';
  }
  if (process.env.NODE_ENV === 'production') {
    return 'production';
  }
  return 'development';
}

/**
 * Get observability configuration based on environment
 */
export function getObservabilityConfig(): ObservabilityConfig {
  const environment = detectEnvironment();

  const config: ObservabilityConfig = {
    enabled: environment !== 'test',
    environment,
    service: {
      name: process.env.OTEL_SERVICE_NAME ?? 'account-link',
      version: process.env.npm_package_version ?? '1.0.0'
    },
    sampling: {
      metrics: true
    },
    exporters: {
      console: environment === 'development'
    }
  };

  if (environment === 'test') {
    config.enabled = false;
    config.sampling.metrics = false;
  }

  return config;
}
