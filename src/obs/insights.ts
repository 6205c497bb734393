/**
 * Azure Application Insights observability wrapper using OpenTelemetry
 *
 * Provides:
 * - Metrics tracking (counters, histograms, gauges)
 * - Dependency tracking (soffice runs)
 * - Correlation ID propagation as span attribute
 * - Graceful degradation when App Insights unavailable
 */

import { useAzureMonitor } from '@azure/monitor-opentelemetry';
import { metrics, trace, context, SpanStatusCode } from '@opentelemetry/api';
import type {
  Counter,
  Histogram,
  Meter,
} from '@opentelemetry/api';
import type { AppConfig } from '../types';
import { createLogger } from '../utils/logger';

const logger = createLogger('obs:insights');

// Service metadata
const SERVICE_NAME = 'officeconv-service';
const SERVICE_VERSION = '1.0.0';

export type MetricName =
  | 'conversion_duration_ms'
  | 'conversion_failures_total'
  | 'rate_limit_rejections_total';

export type GaugeName = 'conversion_pool_active' | 'conversion_pool_queued' | 'rate_limit_clients';

// Telemetry state
let isInitialized = false;
let telemetryEnabled = false;
let meter: Meter | null = null;

// Metric instruments
const counters = new Map<MetricName, Counter>();
const histograms = new Map<MetricName | GaugeName, Histogram>();

/**
 * Initialize Azure Application Insights with OpenTelemetry
 *
 * Skipped in the test environment, when telemetry is disabled, or when no
 * connection string is configured.
 */
export function initializeAppInsights(
  config: Pick<AppConfig, 'nodeEnv' | 'azureMonitorConnectionString' | 'enableTelemetry'>
): void {
  if (isInitialized) {
    return;
  }

  if (config.nodeEnv === 'test' || !config.enableTelemetry) {
    logger.info({ nodeEnv: config.nodeEnv }, 'App Insights disabled');
    telemetryEnabled = false;
    isInitialized = true;
    return;
  }

  if (!config.azureMonitorConnectionString) {
    logger.warn(
      'AZURE_MONITOR_CONNECTION_STRING not set. App Insights telemetry disabled.'
    );
    telemetryEnabled = false;
    isInitialized = true;
    return;
  }

  try {
    useAzureMonitor({
      azureMonitorExporterOptions: {
        connectionString: config.azureMonitorConnectionString,
      },
    });

    meter = metrics.getMeter(SERVICE_NAME, SERVICE_VERSION);
    createMetricInstruments(meter);

    telemetryEnabled = true;
    isInitialized = true;

    logger.info(
      { service: SERVICE_NAME, version: SERVICE_VERSION },
      'App Insights initialized successfully'
    );
  } catch (error) {
    logger.error({ error }, 'Failed to initialize App Insights');
    telemetryEnabled = false;
    isInitialized = true;
  }
}

function createMetricInstruments(m: Meter): void {
  histograms.set(
    'conversion_duration_ms',
    m.createHistogram('conversion_duration_ms', {
      description: 'Document conversion duration in milliseconds',
      unit: 'ms',
    })
  );
  counters.set(
    'conversion_failures_total',
    m.createCounter('conversion_failures_total', {
      description: 'Total number of failed conversion requests',
    })
  );
  counters.set(
    'rate_limit_rejections_total',
    m.createCounter('rate_limit_rejections_total', {
      description: 'Requests refused with 429',
    })
  );

  // Gauges are recorded through histograms
  histograms.set(
    'conversion_pool_active',
    m.createHistogram('conversion_pool_active', { description: 'Number of active soffice jobs' })
  );
  histograms.set(
    'conversion_pool_queued',
    m.createHistogram('conversion_pool_queued', { description: 'Number of queued soffice jobs' })
  );
  histograms.set(
    'rate_limit_clients',
    m.createHistogram('rate_limit_clients', { description: 'Clients with an open rate-limit window' })
  );

  logger.debug('Metric instruments created');
}

/**
 * Track a metric (counter or histogram)
 */
export function trackMetric(
  name: MetricName,
  value: number,
  dimensions: Record<string, string | number> = {}
): void {
  if (!telemetryEnabled) {
    return;
  }

  try {
    const counter = counters.get(name);
    if (counter) {
      counter.add(value, dimensions);
      return;
    }
    histograms.get(name)?.record(value, dimensions);
  } catch (error) {
    logger.error({ error, name }, 'Failed to track metric');
  }
}

/**
 * Track a gauge metric (point-in-time measurement)
 */
export function trackGauge(
  name: GaugeName,
  value: number,
  dimensions: Record<string, string | number> = {}
): void {
  if (!telemetryEnabled) {
    return;
  }

  try {
    histograms.get(name)?.record(value, dimensions);
  } catch (error) {
    logger.error({ error, name }, 'Failed to track gauge');
  }
}

/**
 * Dependency tracking options
 */
export interface DependencyOptions {
  /** Dependency type (e.g., "LibreOffice") */
  type: string;
  /** Dependency name (e.g., "xlsb to ods conversion") */
  name: string;
  /** Duration in milliseconds */
  duration: number;
  success: boolean;
  correlationId: string;
  /** Optional error message for failed dependencies */
  error?: string;
}

/**
 * Track a dependency call as an OpenTelemetry span
 */
export function trackDependency(options: DependencyOptions): void {
  if (!telemetryEnabled) {
    return;
  }

  try {
    const tracer = trace.getTracer(SERVICE_NAME, SERVICE_VERSION);
    const span = tracer.startSpan(
      options.name,
      {
        startTime: Date.now() - options.duration,
      },
      context.active()
    );

    span.setAttribute('dependency.type', options.type);
    span.setAttribute('dependency.name', options.name);
    span.setAttribute('dependency.duration', options.duration);
    span.setAttribute('correlationId', options.correlationId);

    if (options.success) {
      span.setStatus({ code: SpanStatusCode.OK });
    } else {
      span.setStatus({ code: SpanStatusCode.ERROR });
      if (options.error) {
        span.recordException(options.error);
      }
    }

    span.end();
  } catch (error) {
    logger.error({ error, options }, 'Failed to track dependency');
  }
}

/**
 * Check if telemetry is enabled
 */
export function isTelemetryEnabled(): boolean {
  return telemetryEnabled;
}

/**
 * Check if App Insights is initialized
 */
export function isAppInsightsInitialized(): boolean {
  return isInitialized;
}
