/**
 * Build an ArtemisStateMachine from loaded configuration.
 *
 * Wires the configured checkpoint store, the snapshot store under
 * `global.state_dir` (when `state_machine.persist_snapshots` is set), the
 * workflow backoff factor and the LLM response cache switch.
 */

import { resolve } from 'node:path'
import type { ServiceRegistry } from '../../core/di.js'
import type { CardId } from '../../core/types.js'
import { createCheckpointStore } from '../checkpoint/store-factory.js'
import type { ArtemisConfig } from '../config/config-schema.js'
import { ArtemisStateMachine } from './artemis-state-machine.js'
import type { ArtemisStateMachineOptions } from './artemis-state-machine.js'
import { StateSnapshotStore } from './state-snapshot-store.js'

/** Options the configuration does not decide */
export type StateMachineRuntimeOptions = Omit<
  ArtemisStateMachineOptions,
  'cardId' | 'snapshotStore' | 'checkpointStore' | 'enableLlmCache' | 'backoffFactor'
>

export async function createStateMachine(
  cardId: CardId,
  config: Pick<ArtemisConfig, 'global' | 'state_machine' | 'checkpoint'>,
  registry: ServiceRegistry,
  options: StateMachineRuntimeOptions = {}
): Promise<ArtemisStateMachine> {
  const checkpointStore = await createCheckpointStore(
    {
      storage: config.checkpoint.storage,
      checkpointDir: config.global.checkpoint_dir,
      databasePath: config.global.database_path,
    },
    registry
  )

  return new ArtemisStateMachine({
    ...options,
    cardId,
    checkpointStore,
    enableLlmCache: config.checkpoint.enable_llm_cache,
    backoffFactor: config.state_machine.workflow_backoff_factor,
    ...(config.state_machine.persist_snapshots
      ? { snapshotStore: new StateSnapshotStore(resolve(config.global.state_dir)) }
      : {}),
  })
}
