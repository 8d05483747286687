/**
 * @file src/types/api.ts
 * @description Типы для API endpoints
 * @context Интерфейсы запросов и ответов Chat API
 */

import { PipelineEvent, PublicResult } from './pipeline';

// ============================================
// Requests
// ============================================

export interface ChatRequest {
  message: string;
  user_id: string;
  session_id?: string;
  context?: Record<string, unknown>;
}

export interface CreateSessionRequest {
  user_id: string;
  metadata?: Record<string, unknown>;
}

// ============================================
// Responses
// ============================================

export interface ApiResponse<T = unknown> {
  status: 'success' | 'error';
  data?: T;
  error_code?: string;
  message?: string;
  request_id?: string;
}

export interface ChatResponse {
  response: string;
  session_id: string;
  agent_name: string;
  reasoning: string;
  tools_used: string[];
  confidence: number;
  metadata: Omit<PublicResult['metadata'], 'reasoning' | 'toolsUsed'> & {
    run_id: string;
    provenance: string[];
  };
  execution_time_ms: number;
}

export interface SessionInfo {
  session_id: string;
  user_id: string;
  metadata: Record<string, unknown>;
  created_at: string;
  updated_at: string;
  message_count: number;
}

export interface HistoryMessage {
  id: string;
  role: 'user' | 'assistant';
  content: string;
  agent_name: string | null;
  timestamp: string;
  metadata: Record<string, unknown>;
}

export interface MessageHistoryResponse {
  session_id: string;
  messages: HistoryMessage[];
  total_count: number;
}

// ============================================
// SSE
// ============================================

export type ChatStreamEvent =
  | Extract<PipelineEvent, { type: 'progress' }>
  | { type: 'complete'; data: ChatResponse }
  | { type: 'error'; error_code: string; message: string };
