/**
 * Barrel exports for the config module.
 */

export { createConfigSystem, ConfigSystemImpl, coerceScalar, ENV_VAR_MAP, CONFIG_FILE_NAME } from './config-system-impl.js'
export type { ConfigSystem, ConfigSystemOptions } from './config-system.js'
export {
  ArtemisConfigSchema,
  PartialArtemisConfigSchema,
  CheckpointStorageSchema,
  CURRENT_CONFIG_FORMAT_VERSION,
  SUPPORTED_CONFIG_FORMAT_VERSIONS,
} from './config-schema.js'
export type {
  ArtemisConfig,
  PartialArtemisConfig,
  GlobalSettings,
  RetrySettings,
  ParallelSettings,
  TwoPassSettings,
  StateMachineSettings,
  CheckpointSettings,
  CheckpointStorage,
} from './config-schema.js'
export { DEFAULT_CONFIG } from './defaults.js'
