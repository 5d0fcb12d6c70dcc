/**
 * Secret scrubbing for log lines, Pino records and displayed config.
 *
 * LLM clients used for workflow generation and pass assessment carry API keys
 * that must not reach logs, status output or persisted checkpoints.
 */

export const MASKED_VALUE = '***'

/** Object keys whose values are always masked, at any depth */
export const CREDENTIAL_KEYS: readonly string[] = ['api_key', 'apiKey', 'api_key_value', 'token', 'secret', 'password']

const PROVIDER_KEY = String.raw`sk-(?:ant-)?[A-Za-z0-9_-]{20,}`
const BEARER_TOKEN = String.raw`Bearer\s+[A-Za-z0-9._~+/-]{16,}=*`
const HEX_TOKEN = String.raw`\b[A-Fa-f0-9]{40}\b`

const SECRET_PATTERN = new RegExp([PROVIDER_KEY, BEARER_TOKEN, HEX_TOKEN].join('|'), 'g')

/**
 * Redaction paths for `pino({ redact })`. Pino wildcards match one level, so
 * each credential key is listed top-level and one level down.
 */
export const PINO_REDACT_PATHS: string[] = [
  ...CREDENTIAL_KEYS.flatMap((key) => [key, `*.${key}`]),
  'llm.api_key_env',
  'env.ARTEMIS_LLM_API_KEY',
  'env.OPENAI_API_KEY',
  'env.ANTHROPIC_API_KEY',
]

/** Replace provider keys, bearer tokens and 40-char hex tokens with `***` */
export function maskSecrets(input: string): string {
  return input.replace(SECRET_PATTERN, MASKED_VALUE)
}

/**
 * Copy of a plain value tree with credential keys masked and secrets in
 * string leaves scrubbed.
 */
export function deepMask<T>(value: T): T
export function deepMask(value: unknown): unknown {
  if (typeof value === 'string') return maskSecrets(value)
  if (Array.isArray(value)) return value.map((item: unknown) => deepMask(item))
  if (value === null || typeof value !== 'object') return value
  return Object.fromEntries(
    Object.entries(value).map(([key, inner]) => [key, CREDENTIAL_KEYS.includes(key) ? MASKED_VALUE : deepMask(inner)])
  )
}
