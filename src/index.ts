export * from './memory/memory_types';
export * from './memory/errors';
export { ObservationStore, applyRetention } from './memory/ObservationStore';
export type { ObservationStoreOptions, ObservationStoreDependencies, AppendOptions } from './memory/ObservationStore';
export { Summarizer, fallbackSummary } from './memory/Summarizer';
export type { ISummarizer, SummarizerOptions } from './memory/Summarizer';
export { JsonVectorStore, cosineSimilarity } from './memory/VectorStore';
export type { IVectorStore } from './memory/VectorStore';
export { SemanticIndex } from './memory/SemanticIndex';
export type { ISemanticIndex, IndexAvailability, SemanticIndexOptions } from './memory/SemanticIndex';
export { HybridRetriever } from './memory/HybridRetriever';
export type { HybridRetrieverOptions, RecordLookup } from './memory/HybridRetriever';
export { buildContextQuery } from './memory/contextQuery';
export type { ContextQueryBuilder } from './memory/contextQuery';
export { MemoryQueryTools } from './memory/MemoryQueryTools';
export { MEMORY_TOOL_SCHEMAS } from './memory/memoryToolSchemas';
export { MemoryService } from './memory/MemoryService';
export type { MemoryServiceDependencies, MemoryServiceStats } from './memory/MemoryService';
export { ToolCallLoop, BUDGET_EXHAUSTED_NOTE } from './agents/ToolCallLoop';
export type { ConversationState, LoopResult, LoopState, ToolExecutor } from './agents/ToolCallLoop';
export type { ILLMClient, IEmbeddingClient, ChatMessage, ToolSchema, ToolCallRequest } from './agents/ILLMClient';
export { OpenAIClient, OpenAIEmbeddingClient } from './agents/OpenAIClient';
export { createLLMClient, createEmbeddingClient } from './agents/LLMUtils';
export { PromptService } from './services/PromptService';
export { loadMemoirConfig } from './config';
export type { MemoirConfig } from './config';
