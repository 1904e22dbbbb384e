/**
 * Simple in-memory metrics tracking
 * For production, consider using Prometheus, StatsD, or similar
 */

import { ProbeSignal, Verdict } from '../types/email';
import { ResolvedProxy } from '../types/proxy';

type ProxySource = ResolvedProxy['source'] | 'direct';

export interface MetricsSnapshot {
  totalVerifications: number;
  totalSmtpProbes: number;
  verdicts: Record<Verdict, number>;
  probeSignals: Record<ProbeSignal, number>;
  connections: Record<ProxySource, number>;
  catchAllProbes: number;
}

function emptyMetrics(): MetricsSnapshot {
  return {
    totalVerifications: 0,
    totalSmtpProbes: 0,
    verdicts: {
      [Verdict.SAFE]: 0,
      [Verdict.RISKY]: 0,
      [Verdict.INVALID]: 0,
      [Verdict.UNKNOWN]: 0,
    },
    probeSignals: {
      deliverable: 0,
      undeliverable: 0,
      fullMailbox: 0,
      temporaryFailure: 0,
      connectFailure: 0,
      protocolError: 0,
    },
    connections: {
      provider: 0,
      rotation: 0,
      default: 0,
      direct: 0,
    },
    catchAllProbes: 0,
  };
}

class MetricsCollector {
  private metrics: MetricsSnapshot = emptyMetrics();

  recordVerdict(verdict: Verdict): void {
    this.metrics.totalVerifications++;
    this.metrics.verdicts[verdict]++;
  }

  /**
   * One SMTP probe and the route it took
   */
  recordProbe(signal: ProbeSignal, source: ProxySource, catchAll = false): void {
    this.metrics.totalSmtpProbes++;
    this.metrics.probeSignals[signal]++;
    this.metrics.connections[source]++;
    if (catchAll) {
      this.metrics.catchAllProbes++;
    }
  }

  /**
   * Get current metrics snapshot
   */
  getMetrics(): MetricsSnapshot {
    return {
      ...this.metrics,
      verdicts: { ...this.metrics.verdicts },
      probeSignals: { ...this.metrics.probeSignals },
      connections: { ...this.metrics.connections },
    };
  }

  /**
   * Reset all metrics (useful for testing)
   */
  reset(): void {
    this.metrics = emptyMetrics();
  }
}

export const metrics = new MetricsCollector();
