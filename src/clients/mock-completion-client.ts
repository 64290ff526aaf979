/**
 * Mock Completion Client
 *
 * Returns scripted usage without making API calls. Stands in for the Azure
 * client in tests so a comparison can run fully in-process.
 */

import type OpenAI from "openai";
import type { ChatRequest, CompletionResult } from "@/types";
import {
  type CompleteOptions,
  type CompletionClient,
  normalizeUsage,
} from "./completion-client";
import { mapProviderError } from "./errors";

/**
 * One scripted reply: usage counters as the service would report them,
 * or an error to throw instead
 */
export type MockReply =
  | {
      responseText?: string;
      usage: OpenAI.CompletionUsage | undefined;
    }
  | { error: unknown };

export interface MockCall {
  request: ChatRequest;
  deployment: string;
}

export class MockCompletionClient implements CompletionClient {
  readonly calls: MockCall[] = [];
  private replies: MockReply[];

  /**
   * Replies are consumed in order; the last one repeats once the list runs out
   */
  constructor(replies: MockReply[]) {
    if (replies.length === 0) {
      throw new Error("MockCompletionClient needs at least one reply");
    }
    this.replies = replies;
  }

  async complete(
    request: ChatRequest,
    deployment: string,
    options: CompleteOptions = {},
  ): Promise<CompletionResult> {
    if (options.signal?.aborted) {
      const abort = new Error("This operation was aborted");
      abort.name = "AbortError";
      throw mapProviderError(abort, { deployment });
    }

    const reply =
      this.replies[Math.min(this.calls.length, this.replies.length - 1)];
    this.calls.push({ request, deployment });

    if ("error" in reply) {
      throw mapProviderError(reply.error, { deployment });
    }

    const { usage, usageConsistent } = normalizeUsage(reply.usage, deployment);
    return {
      responseText: reply.responseText ?? "Mock response",
      usage,
      usageConsistent,
    };
  }
}
