export type ChatRole = 'system' | 'user' | 'assistant'

export interface ChatMessage {
  role: ChatRole
  content: string
}

/** Per-community model settings, already clamped by `resolveModelConfig`. */
export interface ModelConfig {
  systemPrompt: string
  temperature: number
  maxTokens: number
  model?: string
}

export interface ModelUsage {
  promptTokens: number
  completionTokens: number
  totalTokens: number
}

export const ZERO_USAGE: ModelUsage = Object.freeze({ promptTokens: 0, completionTokens: 0, totalTokens: 0 })

interface ResultBase extends ModelUsage {
  content: string
  latencyMs: number
  requestId: string
  attempts: number
}

export type ModelResult =
  | (ResultBase & { status: 'ok' })
  | (ResultBase & { status: 'rate_limited' })
  | (ResultBase & { status: 'failed'; error: string })
  | (ResultBase & { status: 'cancelled' })

export type ModelResultStatus = ModelResult['status']

export interface AnswerRequest {
  communityId: string
  userId: string
  question: string
  history: ChatMessage[]
  knowledgeContext: string
  config: ModelConfig
  signal?: AbortSignal
}
