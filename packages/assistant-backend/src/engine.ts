import { resolveModelConfig } from './ai/config'
import { ModelClient } from './ai/model-client'
import { ChatMessage, ModelConfig, ModelResult } from './ai/types'
import { KnowledgeBaseService } from './kb/service'
import { KnowledgeDocument, TextIngestRequest, UploadIngestRequest } from './kb/types'
import { ConversationMemory } from './memory/conversation-memory'
import { Logger, errorMessage } from './types'
import { UsageLog } from './usage-log'

export interface AskRequest {
  communityId: string
  userId: string
  question: string
  config?: Partial<ModelConfig>
  signal?: AbortSignal
}

export interface AssistantEngineDeps {
  kb: KnowledgeBaseService
  memory: ConversationMemory
  model: ModelClient
  usage: UsageLog
  logger?: Logger
  /** Chunks handed to the model per question. */
  topK?: number
}

/**
 * Query path: retrieve context, read recent turns, call the model, then
 * record the exchange. Ingestion passes straight through to the knowledge base.
 */
export class AssistantEngine {
  private readonly logger: Logger

  constructor(private readonly deps: AssistantEngineDeps) {
    this.logger = deps.logger ?? console
  }

  async init() {
    await this.deps.kb.init()
    await this.deps.usage.init?.()
  }

  ingestDocument(req: UploadIngestRequest): Promise<KnowledgeDocument> {
    return this.deps.kb.ingestUpload(req)
  }

  ingestText(req: TextIngestRequest): Promise<KnowledgeDocument> {
    return this.deps.kb.ingestText(req)
  }

  deleteDocument(documentId: number): Promise<void> {
    return this.deps.kb.deleteDocument(documentId)
  }

  hasKnowledge(communityId: string): Promise<boolean> {
    return this.deps.kb.hasKnowledge(communityId)
  }

  listDocuments(communityId: string): Promise<KnowledgeDocument[]> {
    return this.deps.kb.listDocuments(communityId)
  }

  /** Resolves to null when the community has no knowledge base to answer from. */
  async ask(req: AskRequest): Promise<ModelResult | null> {
    const { communityId, userId, question } = req
    if (!(await this.deps.kb.hasKnowledge(communityId))) return null

    let context = ''
    try {
      context = await this.deps.kb.retrieve(communityId, question, this.deps.topK)
    } catch (err) {
      this.logger.warn('[kb] retrieval failed', { communityId, error: errorMessage(err) })
    }

    const history: ChatMessage[] = this.deps.memory.history(communityId, userId)
    const result = await this.deps.model.answer({
      communityId,
      userId,
      question,
      history,
      knowledgeContext: context,
      config: resolveModelConfig(req.config),
      signal: req.signal,
    })

    if (result.status === 'cancelled') return result
    this.deps.memory.append(communityId, userId, 'user', question)
    this.deps.memory.append(communityId, userId, 'assistant', result.content)

    try {
      await this.deps.usage.record({
        communityId,
        userId,
        question,
        answer: result.content,
        promptTokens: result.promptTokens,
        completionTokens: result.completionTokens,
        totalTokens: result.totalTokens,
        latencyMs: result.latencyMs,
        status: result.status,
      })
    } catch (err) {
      this.logger.error('[usage] failed to record model call', { communityId, requestId: result.requestId, error: errorMessage(err) })
    }
    return result
  }
}
