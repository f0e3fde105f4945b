import { ModelConfig } from './types'

export const DEFAULT_SYSTEM_PROMPT =
  'You are a friendly community assistant. Answer user questions based on the knowledge base.'
export const DEFAULT_TEMPERATURE = 0.7
export const DEFAULT_MAX_TOKENS = 1024

function clamp(value: number, min: number, max: number) {
  return Math.min(max, Math.max(min, value))
}

function finite(value: number | undefined): value is number {
  return typeof value === 'number' && Number.isFinite(value)
}

export function resolveModelConfig(partial: Partial<ModelConfig> = {}): ModelConfig {
  return {
    systemPrompt: partial.systemPrompt?.trim() || DEFAULT_SYSTEM_PROMPT,
    temperature: finite(partial.temperature) ? clamp(partial.temperature, 0, 2) : DEFAULT_TEMPERATURE,
    maxTokens: finite(partial.maxTokens) ? clamp(Math.floor(partial.maxTokens), 1, 8192) : DEFAULT_MAX_TOKENS,
    model: partial.model || undefined,
  }
}
