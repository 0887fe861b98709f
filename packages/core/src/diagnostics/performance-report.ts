import type { GovernorSnapshot } from '../governor.js';

export const PERFORMANCE_SCOPES = ['all', 'budget', 'coalescer', 'scheduler'] as const;

export type PerformanceScope = (typeof PERFORMANCE_SCOPES)[number];

export interface EventSavingsRow {
  readonly eventName: string;
  readonly coalesced: number;
  readonly dispatched: number;
  readonly saved: number;
}

export interface PerformanceReport {
  readonly scope: PerformanceScope;
  readonly findings: readonly string[];
  readonly recommendations: readonly string[];
  readonly topEvents: readonly EventSavingsRow[];
}

export const PRESSURE_MEAN_MS = 16.67;
export const PRESSURE_P95_MS = 20;
export const HEALTHY_MEAN_MS = 12;
export const HEALTHY_P95_MS = 16;
const TOP_EVENT_LIMIT = 5;

export function isPerformanceScope(value: unknown): value is PerformanceScope {
  return (
    typeof value === 'string' &&
    PERFORMANCE_SCOPES.some((scope) => scope === value)
  );
}

/** Events ranked by deliveries saved, then by total traffic. */
export function rankEventSavings(
  perEvent: GovernorSnapshot['coalescer']['perEvent'],
  limit = TOP_EVENT_LIMIT,
): EventSavingsRow[] {
  const rows = Object.entries(perEvent).map(([eventName, counters]) => ({
    eventName,
    coalesced: counters.coalesced,
    dispatched: counters.dispatched,
    saved: Math.max(0, counters.coalesced - counters.dispatched),
  }));
  rows.sort((a, b) => {
    if (a.saved !== b.saved) {
      return b.saved - a.saved;
    }
    const traffic = b.coalesced + b.dispatched - (a.coalesced + a.dispatched);
    if (traffic !== 0) {
      return traffic;
    }
    return a.eventName < b.eventName ? -1 : a.eventName > b.eventName ? 1 : 0;
  });
  return rows.slice(0, Math.max(0, limit));
}

/**
 * Turns a governor snapshot into human readable findings and tuning
 * recommendations. `scope` restricts the report to one subsystem.
 */
export function analyzePerformance(
  snapshot: GovernorSnapshot,
  scope: PerformanceScope = 'all',
): PerformanceReport {
  const findings: string[] = [];
  const recommendations: string[] = [];
  let topEvents: EventSavingsRow[] = [];
  const includes = (name: PerformanceScope) => scope === 'all' || scope === name;

  if (includes('budget')) {
    const { mean, p95, p99, droppedCallbacks, deferredPending } = snapshot.budget;
    findings.push(
      `Cycle budget: mean=${mean.toFixed(2)}ms p95=${p95.toFixed(2)}ms p99=${p99.toFixed(2)}ms dropped=${droppedCallbacks} deferred=${deferredPending}`,
    );
    if (mean > PRESSURE_MEAN_MS || p95 > PRESSURE_P95_MS) {
      recommendations.push(
        'Cycle pressure is high: apply the medium or low preset and raise coalescing intervals for noisy events.',
      );
    } else if (mean < HEALTHY_MEAN_MS && p95 < HEALTHY_P95_MS) {
      recommendations.push(
        'Cycle headroom is healthy: tighten coalescing intervals only for latency-sensitive events.',
      );
    }
  }

  if (includes('coalescer')) {
    const {
      totalCoalesced,
      totalDispatched,
      queuedEvents,
      savingsPercent,
      budgetDefers,
      emergencyFlushes,
      immediateCritical,
    } = snapshot.coalescer;
    findings.push(
      `Coalescer: coalesced=${totalCoalesced} dispatched=${totalDispatched} queued=${queuedEvents} savings=${savingsPercent.toFixed(1)}% defers=${budgetDefers} emergencyFlushes=${emergencyFlushes} immediateCritical=${immediateCritical}`,
    );

    topEvents = rankEventSavings(snapshot.coalescer.perEvent);
    topEvents.forEach((row, index) => {
      findings.push(
        `Top event ${index + 1}: ${row.eventName} (coalesced=${row.coalesced} dispatched=${row.dispatched} saved=${row.saved})`,
      );
    });

    if (totalCoalesced === 0 && totalDispatched === 0) {
      recommendations.push(
        'No coalescer traffic: submit high-frequency events through the governor and register their subscribers.',
      );
    }
    if (totalCoalesced > 50 && savingsPercent < 20) {
      recommendations.push(
        'Low coalescing savings: increase the delay of noisy events or lower their priority.',
      );
    }
    if (budgetDefers > Math.max(20, totalDispatched * 0.25)) {
      recommendations.push(
        'High budget defers: reduce medium and low event volume, increase delays or lower the base batch size.',
      );
    }
    if (emergencyFlushes > Math.max(10, totalDispatched * 0.1)) {
      recommendations.push(
        'Emergency flushes are high: raise delays on noisy high and medium events and keep critical priority for real state changes.',
      );
    }
  }

  if (includes('scheduler')) {
    const { processed, batchesRun, pending, invalidSkipped, processingBlocks, priorityDecays } =
      snapshot.scheduler;
    findings.push(
      `Scheduler: processed=${processed} batches=${batchesRun} pending=${pending} invalid=${invalidSkipped} blocks=${processingBlocks} decays=${priorityDecays}`,
    );
    if (invalidSkipped > 0) {
      recommendations.push(
        'The scheduler skipped invalid or expired targets: check targets before marking them pending.',
      );
    }
    if (processingBlocks > 10) {
      recommendations.push(
        'Re-entrant scheduler cycles are frequent: avoid marking or flushing updates from inside an update.',
      );
    }
  }

  return Object.freeze({
    scope,
    findings: Object.freeze(findings),
    recommendations: Object.freeze(recommendations),
    topEvents: Object.freeze(topEvents),
  });
}
