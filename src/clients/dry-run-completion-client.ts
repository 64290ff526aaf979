import logger from "@/logging";
import { getTokenizer, type Tokenizer } from "@/tokenizers";
import {
  type ChatRequest,
  type CompletionResult,
  RunCancelledError,
} from "@/types";
import type { CompleteOptions, CompletionClient } from "./completion-client";

export const DRY_RUN_RESPONSE_TEXT =
  "(dry run: no request was sent, prompt tokens are a local tiktoken estimate)";

/**
 * Offline CompletionClient: counts prompt tokens locally and requests no
 * completion, so completion tokens are always 0. Useful for previewing the
 * prompt-side savings without credentials or billed quota.
 */
export class DryRunCompletionClient implements CompletionClient {
  private tokenizer: Tokenizer;

  constructor(model: string, tokenizer: Tokenizer = getTokenizer(model)) {
    this.tokenizer = tokenizer;
  }

  async complete(
    request: ChatRequest,
    deployment: string,
    options: CompleteOptions = {},
  ): Promise<CompletionResult> {
    if (options.signal?.aborted) {
      throw new RunCancelledError();
    }

    const promptTokens = this.tokenizer.countTokens([
      { role: "system", content: request.systemInstruction },
      { role: "user", content: request.userInstruction },
    ]);

    logger.debug(
      { deployment, promptTokens },
      "[CompletionClient] Dry run: estimated prompt tokens",
    );

    return {
      responseText: DRY_RUN_RESPONSE_TEXT,
      usage: { promptTokens, completionTokens: 0, totalTokens: promptTokens },
      usageConsistent: true,
    };
  }
}
