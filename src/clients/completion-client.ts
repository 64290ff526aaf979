import type OpenAI from "openai";
import { AzureOpenAI } from "openai";
import type { LlmConnectionConfig } from "@/config";
import logger from "@/logging";
import {
  type ChatRequest,
  type CompletionResult,
  ServiceUnavailableError,
  type UsageResult,
  UsageResultSchema,
} from "@/types";
import { mapProviderError } from "./errors";

export interface CompleteOptions {
  /** Aborts the in-flight request; surfaces as RunCancelledError */
  signal?: AbortSignal;
}

/**
 * Sends one chat request to an LLM deployment and reports token usage.
 * Every call is billed and non-idempotent.
 */
export interface CompletionClient {
  complete(
    request: ChatRequest,
    deployment: string,
    options?: CompleteOptions,
  ): Promise<CompletionResult>;
}

/**
 * Check the usage counters the service returned and flag totals that do not add up.
 * A mismatch is logged and reported, never fatal.
 */
export function normalizeUsage(
  raw: OpenAI.CompletionUsage | undefined,
  deployment: string,
): { usage: UsageResult; usageConsistent: boolean } {
  if (!raw) {
    throw new ServiceUnavailableError(
      `Response from deployment ${deployment} did not include token usage`,
    );
  }

  const parsed = UsageResultSchema.safeParse({
    promptTokens: raw.prompt_tokens,
    completionTokens: raw.completion_tokens,
    totalTokens: raw.total_tokens,
  });
  if (!parsed.success) {
    throw new ServiceUnavailableError(
      `Response from deployment ${deployment} included malformed token usage`,
      { cause: parsed.error },
    );
  }

  const usage = parsed.data;
  const usageConsistent =
    usage.totalTokens === usage.promptTokens + usage.completionTokens;
  if (!usageConsistent) {
    logger.warn(
      { deployment, ...usage },
      "[CompletionClient] total_tokens does not equal prompt_tokens + completion_tokens",
    );
  }

  return { usage, usageConsistent };
}

/**
 * Transport overrides passed straight to the SDK client
 */
export type AzureClientOptions = Pick<
  NonNullable<ConstructorParameters<typeof AzureOpenAI>[0]>,
  "fetch"
>;

/**
 * Azure OpenAI implementation of CompletionClient.
 * Single attempt per call: the SDK's built-in retries are disabled.
 */
export class AzureOpenAiCompletionClient implements CompletionClient {
  private client: AzureOpenAI;
  private connection: LlmConnectionConfig;

  constructor(
    connection: LlmConnectionConfig,
    clientOptions: AzureClientOptions = {},
  ) {
    logger.debug(
      {
        endpoint: connection.endpoint,
        apiVersion: connection.apiVersion,
        deployment: connection.deployment,
        timeoutMs: connection.timeoutMs,
      },
      "[CompletionClient] Azure OpenAI: initializing client",
    );
    this.connection = connection;
    this.client = new AzureOpenAI({
      apiKey: connection.apiKey,
      endpoint: connection.endpoint,
      apiVersion: connection.apiVersion,
      timeout: connection.timeoutMs,
      maxRetries: 0,
      ...clientOptions,
    });
  }

  async complete(
    request: ChatRequest,
    deployment: string,
    options: CompleteOptions = {},
  ): Promise<CompletionResult> {
    logger.debug(
      {
        deployment,
        temperature: request.temperature,
        userInstructionLength: request.userInstruction.length,
      },
      "[CompletionClient] Azure OpenAI: starting chat completion",
    );

    let response: OpenAI.Chat.Completions.ChatCompletion;
    try {
      response = await this.client.chat.completions.create(
        {
          // Azure routes to /deployments/{model}, so the deployment goes here
          model: deployment,
          temperature: request.temperature,
          messages: [
            { role: "system", content: request.systemInstruction },
            { role: "user", content: request.userInstruction },
          ],
        },
        { signal: options.signal },
      );
    } catch (error) {
      throw mapProviderError(error, {
        deployment,
        timeoutMs: this.connection.timeoutMs,
      });
    }

    const { usage, usageConsistent } = normalizeUsage(
      response.usage,
      deployment,
    );
    const responseText = response.choices[0]?.message.content?.trim() || "";

    logger.debug(
      { deployment, ...usage, responseLength: responseText.length },
      "[CompletionClient] Azure OpenAI: chat completion complete",
    );

    return { responseText, usage, usageConsistent };
  }
}
