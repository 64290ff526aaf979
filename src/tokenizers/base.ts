export interface ChatMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

/**
 * Base interface for tokenizers
 * Provides a unified way to count tokens in the messages of a chat request
 */
export interface Tokenizer {
  /**
   * Count tokens in messages (array or single message)
   */
  countTokens(messages: ChatMessage[] | ChatMessage): number;
}

/**
 * Abstract base class for tokenizers.
 * These tokenizers are approximate: they ignore the per-message framing tokens
 * the service adds. For exact counts, see token usage in the LLM response.
 */
export abstract class BaseTokenizer implements Tokenizer {
  abstract countMessageTokens(message: ChatMessage): number;

  countTokens(messages: ChatMessage[] | ChatMessage): number {
    if (Array.isArray(messages)) {
      return messages.reduce((sum, message) => {
        return sum + this.countMessageTokens(message);
      }, 0);
    }
    return this.countMessageTokens(messages);
  }
}
