/**
 * LlmWorkflowGenerator: asks an LLM for a recovery workflow when none is
 * registered for an issue.
 *
 * The first `{...}` block of the reply is parsed and validated. Anything that
 * does not yield a usable workflow (no client, a client error, no JSON, bad
 * JSON, a schema mismatch, an action nobody registered) returns null.
 */

import { z } from 'zod'
import { createLogger } from '../../utils/logger.js'
import { toError } from '../../utils/helpers.js'
import type { RecoveryActionRegistry } from './recovery-actions.js'
import { ARTEMIS_STATES, isArtemisState } from './types.js'
import type { ArtemisState, IssueType, Workflow, WorkflowAction, WorkflowContext } from './types.js'

const logger = createLogger('state-machine:llm-workflow')

// ---------------------------------------------------------------------------
// LLM client contract
// ---------------------------------------------------------------------------

export interface LlmMessage {
  role: 'system' | 'user' | 'assistant'
  content: string
}

export interface LlmCompletionRequest {
  messages: LlmMessage[]
  temperature: number
  maxTokens: number
}

export interface LlmCompletion {
  content: string
}

export interface LlmClient {
  complete(request: LlmCompletionRequest): Promise<LlmCompletion>
}

// ---------------------------------------------------------------------------
// Reply schema
// ---------------------------------------------------------------------------

const GeneratedActionSchema = z.object({
  action_name: z.string().min(1),
  description: z.string().optional(),
  max_attempts: z.number().int().positive().optional(),
  parameters: z.record(z.string(), z.unknown()).optional(),
})

export const GeneratedWorkflowSchema = z.object({
  workflow_name: z.string().min(1).optional(),
  description: z.string().optional(),
  actions: z.array(GeneratedActionSchema).min(1),
  success_state: z.string().optional(),
  failure_state: z.string().optional(),
  rollback_on_failure: z.boolean().optional(),
})

export type GeneratedWorkflow = z.infer<typeof GeneratedWorkflowSchema>

const SYSTEM_PROMPT =
  'You are an expert in designing recovery workflows for software pipelines.\n' +
  'When given an issue type and context, you generate a step-by-step recovery workflow in JSON format.'

const JSON_BLOCK = /\{.*\}/s

export const LLM_WORKFLOW_TEMPERATURE = 0.3
export const LLM_WORKFLOW_MAX_TOKENS = 1500

// ---------------------------------------------------------------------------
// LlmWorkflowGenerator
// ---------------------------------------------------------------------------

export class LlmWorkflowGenerator {
  private readonly _client: LlmClient | undefined
  private readonly _registry: RecoveryActionRegistry

  constructor(client: LlmClient | undefined, registry: RecoveryActionRegistry) {
    this._client = client
    this._registry = registry
  }

  get hasClient(): boolean {
    return this._client !== undefined
  }

  buildMessages(issueType: IssueType, context: WorkflowContext): LlmMessage[] {
    const contextLines = Object.entries(context)
      .filter(([, value]) => value !== undefined && value !== null)
      .map(([key, value]) => `- ${key}: ${typeof value === 'string' ? value : JSON.stringify(value)}`)
      .join('\n')

    const example = {
      workflow_name: 'Brief descriptive name',
      description: 'What this workflow does',
      actions: [
        {
          action_name: 'retry_with_backoff',
          description: 'What this action does',
          max_attempts: 3,
          parameters: { backoff_seconds: 60 },
        },
      ],
      success_state: 'STAGE_RUNNING',
      failure_state: 'STAGE_FAILED',
      rollback_on_failure: false,
    }

    const user = [
      'Generate a recovery workflow for the following issue:',
      '',
      `Issue Type: ${issueType}`,
      'Context:',
      contextLines,
      '',
      'Provide a recovery workflow in JSON format:',
      JSON.stringify(example, null, 2),
      '',
      `Available actions: ${this._registry.names.join(', ')}`,
      `Available states: ${ARTEMIS_STATES.map((s) => s.toUpperCase()).join(', ')}`,
    ].join('\n')

    return [
      { role: 'system', content: SYSTEM_PROMPT },
      { role: 'user', content: user },
    ]
  }

  async generate(issueType: IssueType, context: WorkflowContext): Promise<Workflow | null> {
    if (this._client === undefined) {
      logger.warn({ issueType }, 'Cannot generate workflow: no LLM client configured')
      return null
    }

    let reply: LlmCompletion
    try {
      reply = await this._client.complete({
        messages: this.buildMessages(issueType, context),
        temperature: LLM_WORKFLOW_TEMPERATURE,
        maxTokens: LLM_WORKFLOW_MAX_TOKENS,
      })
    } catch (err) {
      logger.warn({ issueType, err: toError(err) }, 'LLM workflow request failed')
      return null
    }

    const data = this.parseReply(reply.content)
    if (data === null) return null

    const workflow = this._toWorkflow(data, issueType)
    if (workflow !== null) {
      logger.info({ issueType, workflow: workflow.name, actions: workflow.actions.length }, 'Generated recovery workflow')
    }
    return workflow
  }

  /** Extract and validate the JSON workflow in an LLM reply */
  parseReply(content: string): GeneratedWorkflow | null {
    const match = JSON_BLOCK.exec(content)
    if (match === null) {
      logger.warn('LLM reply contains no JSON object')
      return null
    }

    let raw: unknown
    try {
      raw = JSON.parse(match[0])
    } catch (err) {
      logger.warn({ err: toError(err) }, 'LLM reply JSON does not parse')
      return null
    }

    const parsed = GeneratedWorkflowSchema.safeParse(raw)
    if (!parsed.success) {
      logger.warn({ issues: parsed.error.issues.map((i) => i.message) }, 'LLM workflow does not match the schema')
      return null
    }
    return parsed.data
  }

  private _toWorkflow(data: GeneratedWorkflow, issueType: IssueType): Workflow | null {
    const missing = data.actions.map((a) => a.action_name).filter((name) => !this._registry.has(name))
    if (missing.length > 0) {
      logger.warn({ issueType, missing }, 'LLM workflow names unregistered actions')
      return null
    }

    const actions: WorkflowAction[] = []
    for (const spec of data.actions) {
      const registered = this._registry.get(spec.action_name)
      if (registered === undefined) return null
      const parameters = spec.parameters ?? {}
      const attempts = spec.max_attempts ?? 1
      actions.push({
        actionName: spec.action_name,
        handler: (context) => {
          Object.assign(context, parameters)
          return registered.execute(context)
        },
        rollbackHandler: registered.rollback === undefined ? undefined : (context) => registered.rollback?.(context),
        retryOnFailure: attempts > 1,
        maxRetries: attempts,
      })
    }

    return {
      name: data.workflow_name ?? `LLM-generated-${issueType}`,
      issueType,
      actions,
      successState: parseState(data.success_state ?? 'STAGE_RUNNING', 'running'),
      failureState: parseState(data.failure_state ?? 'STAGE_FAILED', 'failed'),
      rollbackOnFailure: data.rollback_on_failure ?? false,
    }
  }
}

function parseState(value: string, fallback: ArtemisState): ArtemisState {
  const normalized = value.trim().toLowerCase()
  return isArtemisState(normalized) ? normalized : fallback
}
