/**
 * Prometheus telemetry entry point for Node.js environments.
 *
 * Kept apart from the main entry so hosts that never export metrics do not
 * load prom-client.
 *
 * @example
 * import { TickGovernor } from '@tick-governor/core';
 * import { createPrometheusTelemetry } from '@tick-governor/core/prometheus';
 *
 * const telemetry = createPrometheusTelemetry();
 * const governor = new TickGovernor({ telemetry });
 */

export {
  createPrometheusTelemetry,
  type PrometheusTelemetryOptions,
  type PrometheusTelemetryFacade,
} from './telemetry-prometheus.js';
