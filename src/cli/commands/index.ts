/**
 * CLI Commands - Public API
 */

export { executeTrackCommand, type TrackCommandDeps, type TrackCommandOptions, type TrackerHandle } from './track.js';
export { executeDiagnoseCommand, type DiagnoseCommandDeps, type DiagnoseCommandOptions } from './diagnose.js';
export {
  executeSimulateCommand,
  renderSnapshot,
  gameLogLine,
  SIMULATED_RUN,
  SNAPSHOT_FILE_NAME,
  type SimulateCommandDeps,
  type SimulateCommandOptions,
  type SnapshotFormat,
} from './simulate.js';
