import type { PipelineCheckpoint, StageCheckpoint } from '../models.js'

export function makeStage(stageName: string, overrides: Partial<StageCheckpoint> = {}): StageCheckpoint {
  return {
    stageName,
    status: 'completed',
    startTime: '2026-01-01T00:00:00.000Z',
    endTime: '2026-01-01T00:00:05.000Z',
    durationSeconds: 5,
    result: { ok: true },
    artifacts: [],
    llmResponses: [],
    errorMessage: null,
    retryCount: 0,
    metadata: {},
    ...overrides,
  }
}

export function makeCheckpoint(cardId: string, overrides: Partial<PipelineCheckpoint> = {}): PipelineCheckpoint {
  return {
    checkpointId: `checkpoint-${cardId}-1767225600`,
    cardId,
    status: 'active',
    createdAt: '2026-01-01T00:00:00.000Z',
    updatedAt: '2026-01-01T00:00:05.000Z',
    completedStages: ['plan'],
    failedStages: [],
    skippedStages: [],
    currentStage: 'build',
    stageCheckpoints: { plan: makeStage('plan') },
    executionContext: { requirements: 'Add search' },
    totalStages: 3,
    stagesCompleted: 1,
    totalDurationSeconds: 5,
    estimatedRemainingSeconds: 10,
    resumeCount: 0,
    lastResumeTime: null,
    metadata: {},
    ...overrides,
  }
}
