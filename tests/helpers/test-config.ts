import { createValidatedConfig, loadConfig } from '../../src/config/app-config.js';
import type { AppConfig, ValidatedConfig } from '../../src/config/app-config.js';

/**
 * Defaults as loaded from an empty environment, with presence kept in the
 * log and logging silenced. Sections in `overrides` replace whole sections.
 */
export function testConfig(overrides: Partial<AppConfig> = {}): ValidatedConfig {
  const base = loadConfig({ env: { MCSR_DISABLE_DISCORD: '1', MCSR_LOG_LEVEL: 'silent' } }).match(
    (config) => config,
    () => {
      throw new Error('default test config failed to load');
    },
  );
  return createValidatedConfig({ ...base, ...overrides });
}
