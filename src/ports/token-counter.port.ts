// =============================================================================
// TokenEstimatorPort — Token counting backend contract
// =============================================================================

export interface ChatMessage {
  role: string;
  content: string;
}

export interface TokenEstimatorPort {
  count(text: string, model: string): number;
  /** Includes per-message role framing and per-conversation overhead. */
  countMessages(messages: readonly ChatMessage[], model: string): number;
}
