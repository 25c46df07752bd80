// DI container
export { initializeContainer, container, resetContainer } from './di/container.js';
export type { ContainerInitOptions, TrackerFactory } from './di/container.js';
export { DI } from './di/tokens.js';

// Split domain
export {
  SPLIT_ORDER,
  SOFT_STATES,
  SPLIT_COUNT,
  DEFAULT_SOFT_BAND,
  rankOf,
  milestoneAtRank,
  isMilestone,
  isSoftState,
  isWithinBand,
} from './domain/splits/milestones.js';
export type { Milestone, SoftState, DisplayState, SoftBand } from './domain/splits/milestones.js';
export { DetectedEvents } from './domain/splits/detected-event.js';
export type { DetectedEvent, EventSource } from './domain/splits/detected-event.js';
export { PatternTable, DEFAULT_PATTERN_RULES } from './domain/splits/pattern-table.js';
export type { PatternRule } from './domain/splits/pattern-table.js';
export { RunStateMachine, DEFAULT_COOLDOWN_MS } from './domain/splits/run-state-machine.js';
export type { RunSnapshot, TransitionOutcome, IgnoreReason } from './domain/splits/run-state-machine.js';
export { canonicalMilestone } from './domain/splits/snapshot-aliases.js';

// Sources
export { LineStreamReader } from './infrastructure/stream/line-stream-reader.js';
export { SnapshotReader, parseSnapshot, toSnapshotEvents } from './infrastructure/snapshot/snapshot-reader.js';
export type { SnapshotObservation, SplitTimes } from './infrastructure/snapshot/snapshot-reader.js';
export { NodeFileSystem } from './infrastructure/fs/node-file-system.js';
export type { SplitFileSystemPort } from './infrastructure/fs/fs.port.js';

// Tracking and presence
export { SplitTracker } from './application/split-tracker.js';
export type { LineSource, SnapshotSource, SplitTrackerDeps } from './application/split-tracker.js';
export { PresencePublisher } from './infrastructure/presence/presence-publisher.js';
export type { SplitPublisher } from './infrastructure/presence/presence-publisher.js';
export { renderPresence, formatIgt } from './infrastructure/presence/presence-renderer.js';
export type { PresenceView } from './infrastructure/presence/presence-renderer.js';
export type { PresenceSink } from './infrastructure/presence/presence-sink.js';
export { DiscordPresenceSink } from './infrastructure/presence/discord-presence-sink.js';
export { LogPresenceSink } from './infrastructure/presence/log-presence-sink.js';

// Config and errors
export { loadConfig } from './config/app-config.js';
export type { AppConfig, ValidatedConfig } from './config/app-config.js';
export type { AppError } from './errors/index.js';
export { formatAppError } from './errors/index.js';
