import { ChatMessage } from './types'

export const CONTEXT_CHAR_LIMIT = 6000
export const HISTORY_MESSAGE_LIMIT = 10

const KNOWLEDGE_PREAMBLE =
  "\n\nBelow is your knowledge base. Answer user questions based on this content. If the answer is not in the knowledge base, say you're not sure but try to be helpful.\n---\n"

export function buildMessages(systemPrompt: string, knowledgeContext: string, history: ChatMessage[], question: string): ChatMessage[] {
  let system = systemPrompt
  if (knowledgeContext) {
    system += `${KNOWLEDGE_PREAMBLE}${knowledgeContext.slice(0, CONTEXT_CHAR_LIMIT)}\n---`
  }
  return [
    { role: 'system', content: system },
    ...history.slice(-HISTORY_MESSAGE_LIMIT),
    { role: 'user', content: question },
  ]
}
