import type { TelemetrySink, TelemetrySnapshot } from '../../../types/telemetry';
import { formatSnapshot } from '../../../utils/format';
import { createLogger } from '../../../utils/logger';
import type { UnitSystem } from '../../../utils/unitConversions';

const log = createLogger('Telemetry');

/**
 * Prints one formatted line per snapshot at info level.
 */
export class ConsoleTelemetrySink implements TelemetrySink {
  private unitSystem: UnitSystem;

  constructor(unitSystem: UnitSystem = 'imperial') {
    this.unitSystem = unitSystem;
  }

  accept(snapshot: TelemetrySnapshot): void {
    log.info(formatSnapshot(snapshot, this.unitSystem));
  }
}
