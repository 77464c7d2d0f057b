import type { TelemetrySink, TelemetrySnapshot } from '../../../types/telemetry';

// Keeps every snapshot in memory; used by tests and for post-flight reports
export class CollectingTelemetrySink implements TelemetrySink {
  private snapshots: TelemetrySnapshot[] = [];

  accept(snapshot: TelemetrySnapshot): void {
    this.snapshots.push(snapshot);
  }

  getSnapshots(): readonly TelemetrySnapshot[] {
    return this.snapshots;
  }

  clear(): void {
    this.snapshots = [];
  }
}
