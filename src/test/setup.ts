import { afterEach, vi } from "vitest";

// Keep test output readable and never pick up a developer's real credentials
process.env.COMPARISON_LOGGING_LEVEL = "silent";
delete process.env.AZURE_OPENAI_API_KEY;
delete process.env.AZURE_OPENAI_ENDPOINT;
delete process.env.AZURE_OPENAI_DEPLOYMENT;

afterEach(() => {
  vi.restoreAllMocks();
});
