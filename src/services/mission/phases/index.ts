export { AscendExecutor } from './AscendExecutor';
export { HoldExecutor } from './HoldExecutor';
export { CircularPathExecutor } from './CircularPathExecutor';
export { DescendAndLandExecutor } from './DescendAndLandExecutor';
export { completeTick, tickIntervalMs, ticksFor, PHASE_OK } from './PhaseContext';
export type { PhaseContext, PhaseExecutor } from './PhaseContext';
