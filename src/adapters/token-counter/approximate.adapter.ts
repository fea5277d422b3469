// =============================================================================
// ApproximateTokenCounter — Char-based token estimation
// =============================================================================

import type { ChatMessage, TokenEstimatorPort } from "../../ports/token-counter.port.js";

const CHARS_PER_TOKEN = 4;
const ROLE_OVERHEAD_TOKENS = 4;
const CONVERSATION_OVERHEAD_TOKENS = 3;

export class ApproximateTokenCounter implements TokenEstimatorPort {
  count(text: string): number {
    if (!text) return 0;
    return Math.ceil(text.length / CHARS_PER_TOKEN);
  }

  countMessages(messages: readonly ChatMessage[]): number {
    if (!messages.length) return 0;
    return messages.reduce(
      (sum, msg) => sum + this.count(msg.content) + ROLE_OVERHEAD_TOKENS,
      CONVERSATION_OVERHEAD_TOKENS,
    );
  }
}
