import Anthropic from "@anthropic-ai/sdk";

export interface ChatPrompt {
  system: string;
  user: string;
}

export interface CompletionOptions {
  signal?: AbortSignal;
}

/** Minimal text-completion seam the pipeline depends on. */
export interface LlmClient {
  complete(prompt: ChatPrompt, options?: CompletionOptions): Promise<string>;
}

export interface LlmClientOptions {
  model: string;
  maxTokens: number;
  timeoutMs: number;
}

export function createAnthropicClient(apiKey: string): Anthropic {
  return new Anthropic({ apiKey });
}

export function createLlmClient(
  client: Anthropic,
  options: LlmClientOptions,
): LlmClient {
  return {
    async complete(prompt, completionOptions) {
      const response = await client.messages.create(
        {
          model: options.model,
          max_tokens: options.maxTokens,
          system: prompt.system,
          messages: [{ role: "user", content: prompt.user }],
        },
        {
          timeout: options.timeoutMs,
          maxRetries: 1,
          signal: completionOptions?.signal,
        },
      );

      return response.content
        .map((block) => (block.type === "text" ? block.text : ""))
        .join("");
    },
  };
}
