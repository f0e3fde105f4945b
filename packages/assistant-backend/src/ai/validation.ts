import Ajv from 'ajv'
import addFormats from 'ajv-formats'

const ajv = new Ajv({ allErrors: true, strict: false })
addFormats(ajv)

export interface ChatCompletionPayload {
  choices: { message: { content: string } }[]
  usage?: {
    prompt_tokens?: number | null
    completion_tokens?: number | null
    total_tokens?: number | null
  } | null
}

const tokenCount = { type: ['integer', 'null'], minimum: 0 }

export const isChatCompletionPayload = ajv.compile<ChatCompletionPayload>({
  type: 'object',
  required: ['choices'],
  properties: {
    choices: {
      type: 'array',
      minItems: 1,
      items: {
        type: 'object',
        required: ['message'],
        properties: {
          message: {
            type: 'object',
            required: ['content'],
            properties: { content: { type: 'string' } },
          },
        },
      },
    },
    usage: {
      type: ['object', 'null'],
      properties: {
        prompt_tokens: tokenCount,
        completion_tokens: tokenCount,
        total_tokens: tokenCount,
      },
    },
  },
})

export interface ModelClientSettings {
  apiKey: string
  baseUrl?: string
  model?: string
  timeoutMs?: number
  maxAttempts?: number
  retryDelayMs?: number
  maxConcurrency?: number
  rateLimitPerMinute?: number
}

const validateSettings = ajv.compile<ModelClientSettings>({
  type: 'object',
  required: ['apiKey'],
  properties: {
    apiKey: { type: 'string', minLength: 1 },
    baseUrl: { type: 'string', format: 'uri' },
    model: { type: 'string', minLength: 1 },
    timeoutMs: { type: 'integer', minimum: 1 },
    maxAttempts: { type: 'integer', minimum: 1, maximum: 10 },
    retryDelayMs: { type: 'integer', minimum: 0 },
    maxConcurrency: { type: 'integer', minimum: 1 },
    rateLimitPerMinute: { type: 'integer', minimum: 1 },
  },
})

export class InvalidConfigError extends Error {
  constructor(readonly details: string) {
    super(`invalid_config: ${details}`)
    this.name = 'InvalidConfigError'
  }
}

export function validateModelClientSettings(settings: ModelClientSettings): ModelClientSettings {
  if (!validateSettings(settings)) {
    const message = validateSettings.errors?.map((e) => `${e.instancePath || e.schemaPath} ${e.message}`).join('; ')
    throw new InvalidConfigError(message || 'unknown')
  }
  return settings
}
