/**
 * @fileoverview Flight-mode state machine.
 *
 * @module mission/flightModes
 */

import type { DroneState, FlightMode } from '../../types/drone';
import type { CommandKind } from '../../types/mission';

const TRANSITIONS: Record<FlightMode, readonly FlightMode[]> = {
  Disarmed: ['Armed', 'Aborted'],
  Armed: ['Ascend', 'Hover', 'Circle', 'Descending', 'MissionComplete', 'Aborted'],
  Ascend: ['Stabilizing', 'Aborted'],
  Stabilizing: ['Hover', 'Aborted'],
  Hover: ['Ascend', 'Hover', 'Circle', 'Descending', 'MissionComplete', 'Aborted'],
  Circle: ['Ascend', 'Hover', 'Circle', 'Descending', 'MissionComplete', 'Aborted'],
  Descending: ['FinalApproach', 'Aborted'],
  FinalApproach: ['Landed', 'Aborted'],
  Landed: ['Ascend', 'MissionComplete', 'Aborted'],
  MissionComplete: [],
  Aborted: []
};

/** Mode each command kind switches to when it starts */
export const ENTRY_MODE: Record<CommandKind, FlightMode> = {
  Ascend: 'Ascend',
  Hold: 'Hover',
  CircularPath: 'Circle',
  DescendAndLand: 'Descending'
};

/** Mode each command kind leaves the vehicle in */
export const EXIT_MODE: Record<CommandKind, FlightMode> = {
  Ascend: 'Hover',
  Hold: 'Hover',
  CircularPath: 'Circle',
  DescendAndLand: 'Landed'
};

export const isTerminalMode = (mode: FlightMode): boolean => TRANSITIONS[mode].length === 0;

export const canTransition = (from: FlightMode, to: FlightMode): boolean => TRANSITIONS[from].includes(to);

/**
 * Moves the state to `to`. An illegal transition is an engine bug, not a
 * mission failure, and throws.
 */
export const setMode = (state: DroneState, to: FlightMode): void => {
  if (!canTransition(state.mode, to)) {
    throw new Error(`Illegal flight mode transition ${state.mode} -> ${to}`);
  }
  state.mode = to;
};

/**
 * Walks a command sequence through the transition table, starting armed.
 * Returns the index of the first command that cannot start, or -1.
 */
export const findIllegalCommand = (kinds: CommandKind[]): number => {
  let mode: FlightMode = 'Armed';
  for (let index = 0; index < kinds.length; index++) {
    const kind = kinds[index];
    if (!canTransition(mode, ENTRY_MODE[kind])) {
      return index;
    }
    mode = EXIT_MODE[kind];
  }
  return -1;
};
