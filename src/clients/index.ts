export {
  type AzureClientOptions,
  AzureOpenAiCompletionClient,
  type CompleteOptions,
  type CompletionClient,
  normalizeUsage,
} from "./completion-client";
export {
  DRY_RUN_RESPONSE_TEXT,
  DryRunCompletionClient,
} from "./dry-run-completion-client";
export { mapProviderError } from "./errors";
export {
  type MockCall,
  MockCompletionClient,
  type MockReply,
} from "./mock-completion-client";
