export const OPENAI_API_KEY_ENV_VAR = 'OPENAI_API_KEY';
export const BASE_URL_ENV_VAR = 'BASE_URL'; // Any OpenAI-compatible endpoint (Groq, local proxy, ...)
export const DEFAULT_MODEL_NAME = 'gpt-4o-mini'; // General default
export const DEFAULT_EMBEDDING_MODEL_NAME = 'text-embedding-3-small';
export const DEFAULT_TEMPERATURE = 0.7;
export const DEFAULT_MAX_TOKENS = 1500;
