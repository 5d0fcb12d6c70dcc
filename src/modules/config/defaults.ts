/**
 * Built-in default values for the Artemis configuration system.
 *
 * These are the lowest-priority defaults; they are overridden by:
 *   global config → project config → environment variables → CLI flags
 */

import type {
  ArtemisConfig,
  CheckpointSettings,
  GlobalSettings,
  ParallelSettings,
  RetrySettings,
  StateMachineSettings,
  TwoPassSettings,
} from './config-schema.js'

export const DEFAULT_GLOBAL_SETTINGS: GlobalSettings = {
  log_level: 'info',
  state_dir: '.artemis/state',
  checkpoint_dir: '.artemis/checkpoints',
  database_path: '.artemis/artemis.db',
}

export const DEFAULT_RETRY_SETTINGS: RetrySettings = {
  max_retries: 3,
  initial_delay_seconds: 1.0,
  backoff_multiplier: 2.0,
  max_delay_seconds: 60,
}

export const DEFAULT_PARALLEL_SETTINGS: ParallelSettings = {
  enabled: false,
  max_workers: 4,
}

export const DEFAULT_TWO_PASS_SETTINGS: TwoPassSettings = {
  auto_rollback: true,
  rollback_threshold: -0.1,
  max_retries: 3,
  intensity: 0.5,
  quality_threshold: 0.7,
  first_pass_timeout_seconds: 30,
  second_pass_timeout_seconds: 120,
}

export const DEFAULT_STATE_MACHINE_SETTINGS: StateMachineSettings = {
  workflow_backoff_factor: 2,
  persist_snapshots: true,
}

export const DEFAULT_CHECKPOINT_SETTINGS: CheckpointSettings = {
  storage: 'file',
  enable_llm_cache: true,
}

export const DEFAULT_CONFIG: ArtemisConfig = {
  config_format_version: '1',
  global: DEFAULT_GLOBAL_SETTINGS,
  retry: DEFAULT_RETRY_SETTINGS,
  parallel: DEFAULT_PARALLEL_SETTINGS,
  two_pass: DEFAULT_TWO_PASS_SETTINGS,
  state_machine: DEFAULT_STATE_MACHINE_SETTINGS,
  checkpoint: DEFAULT_CHECKPOINT_SETTINGS,
}
