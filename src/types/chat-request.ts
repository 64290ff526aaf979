import type { UsageResult } from "./usage";

export interface ChatRequest {
  systemInstruction: string;
  userInstruction: string;
  temperature: number;
}

export interface CompletionResult {
  responseText: string;
  usage: UsageResult;
  /** False when the service reported total_tokens != prompt + completion */
  usageConsistent: boolean;
}
