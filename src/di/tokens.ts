/**
 * Dependency Injection Token Registry
 *
 * Single source of truth for all DI tokens, grouped by layer.
 *
 * ADDING A NEW SERVICE:
 * 1. Add a token here under the matching namespace
 * 2. Register a factory for it in container.ts
 * 3. Resolve it with `container.resolve<T>(DI.X.Y)` at the composition root
 */
export const DI = {
  // ═══════════════════════════════════════════════════════════════════
  // RUNTIME (process-level behavior, injected for explicitness)
  // ═══════════════════════════════════════════════════════════════════
  Runtime: {
    /** Runtime mode (production/test) */
    Mode: Symbol('Runtime.Mode'),
    /** SIGINT/SIGTERM registration */
    ProcessSignals: Symbol('Runtime.ProcessSignals'),
    /** Shutdown request event bus */
    ShutdownEvents: Symbol('Runtime.ShutdownEvents'),
    /** Process terminator (composition roots only) */
    ProcessTerminator: Symbol('Runtime.ProcessTerminator'),
    /** Wall clock */
    Clock: Symbol('Runtime.Clock'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // CONFIGURATION
  // ═══════════════════════════════════════════════════════════════════
  Config: {
    /** Complete application configuration (validated). */
    App: Symbol('Config.App'),
  },

  Logging: {
    Factory: Symbol('Logging.Factory'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // INFRASTRUCTURE
  // ═══════════════════════════════════════════════════════════════════
  Infra: {
    /** Read-only file access for both split sources */
    FileSystem: Symbol('Infra.FileSystem'),
    /** Discord or log-only presence output */
    PresenceSink: Symbol('Infra.PresenceSink'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // SPLITS
  // ═══════════════════════════════════════════════════════════════════
  Splits: {
    PatternTable: Symbol('Splits.PatternTable'),
    StateMachine: Symbol('Splits.StateMachine'),
    /** Builds a tracker once the log and snapshot locations are known */
    TrackerFactory: Symbol('Splits.TrackerFactory'),
  },

  Presence: {
    Publisher: Symbol('Presence.Publisher'),
  },
} as const;
