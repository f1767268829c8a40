export interface Env {
  OPENAI_API_KEY?: string;
  OPENAI_MODEL?: string;
  OPENAI_TEMPERATURE?: string;
  OPENAI_TIMEOUT_MS?: string;
  OPENAI_MODERATION_MODEL?: string;
  MAX_OUTPUT_TOKENS?: string;
  MODEL_MAX_ATTEMPTS?: string;
  MODEL_RETRY_BASE_MS?: string;
  ENABLE_MODERATION?: string;
  WINDOW_SIZE?: string;
  SESSION_TIMEOUT_SECONDS?: string;
  MAX_SESSIONS?: string;
  SESSION_SWEEP_INTERVAL_MS?: string;
  STRICT_PERSISTENCE?: string;
  RETRIEVAL_K?: string;
  RETRIEVAL_MAX_CONTEXT_CHARS?: string;
  RETRIEVAL_KEYWORDS?: string;
  KNOWLEDGE_BASE_PATH?: string;
  PROMPT_TEMPLATE_DIR?: string;
  PROMPT_TEMPLATE_NAME?: string;
  PROMPT_MAX_HISTORY_MESSAGES?: string;
  REQUEST_TIMEOUT_MS?: string;
  MAX_QUERY_CHARS?: string;
  MAX_BODY_BYTES?: string;
  SECRET_KEY?: string;
  PASSWORD_SALT?: string;
  ADMIN_USERNAME?: string;
  ADMIN_PASSWORD?: string;
  ACCESS_TOKEN_EXPIRE_MINUTES?: string;
  CHAT_RATE_LIMIT_PER_MINUTE?: string;
  ALLOWED_ORIGINS?: string;
  LOG_LEVEL?: string;
  PORT?: string;
}

export interface AccessClaims {
  sub: string;
  exp: number;
  iat: number;
}

export interface AuthContext {
  claims: AccessClaims;
  username: string;
}

export interface CitationPayload {
  source: string;
  snippet: string;
}

export interface ChatRequest {
  query: string;
  session_id?: string;
  stream: boolean;
}

export interface ChatResponse {
  answer: string;
  citations: CitationPayload[];
  session_id: string;
  timestamp: string;
}

export interface ChatHistoryResponse {
  session_id: string;
  messages: Array<{
    role: 'human' | 'assistant';
    content: string;
    timestamp: string;
  }>;
  total_messages: number;
}

export interface SessionInfoResponse {
  session_id: string;
  created_at: string;
  last_active_at: string;
  message_count: number;
}

export interface SearchRequest {
  query: string;
  max_results: number;
}

export interface SearchResponse {
  query: string;
  total_results: number;
  max_results: number;
  documents: Array<{
    source: string;
    content: string;
    score: number;
    metadata: Record<string, unknown>;
  }>;
  citations: CitationPayload[];
}

export interface SafetyTestRequest {
  content: string;
}

export interface SafetyTestResponse {
  original_content: string;
  processed_content: string;
  blocked: boolean;
  categories: string[];
  filter_enabled: boolean;
  processing_time_ms: number;
}

export interface FilterHealthResponse {
  status: 'disabled' | 'healthy' | 'unhealthy';
  filter_enabled: boolean;
  model: string | null;
  message: string | null;
  timestamp: string;
}

export interface LoginRequest {
  username: string;
  password: string;
}

export interface TokenResponse {
  access_token: string;
  token_type: 'bearer';
  expires_at: string;
}

export interface ErrorResponse {
  error: {
    message: string;
    type: string;
    status_code: number;
    request_id: string;
    retry_after_seconds?: number;
  };
}
