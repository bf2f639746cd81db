// ============================================================================
// Library Entry: Public API
// ============================================================================

export * from './detectors/index.js';
export * from './files/index.js';
export * from './inventory/index.js';
export { appConfig, loadConfig } from './config.js';
export type { AppConfig } from './config.js';
