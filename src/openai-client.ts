import OpenAI from "openai";
import type {
  ChatCompletion,
  ChatCompletionContentPart,
  ChatCompletionMessageParam,
} from "openai/resources/chat/completions";
import { ProviderError, ProviderTimeoutError } from "./errors.js";
import { logger } from "./logger.js";
import type {
  ChatTurn,
  CompletionOptions,
  CompletionProvider,
  ContentPart,
  ProviderConfig,
} from "./types.js";

function toContentPart(part: ContentPart): ChatCompletionContentPart {
  if (part.type === "text") {
    return { type: "text", text: part.text };
  }
  return { type: "image_url", image_url: { url: part.image_url.url } };
}

function textOf(content: ChatTurn["content"]): string {
  if (typeof content === "string") {
    return content;
  }
  return content
    .flatMap((part) => (part.type === "text" ? [part.text] : []))
    .join("\n");
}

/**
 * Convert a relay turn into the SDK's message shape. Only user turns may
 * carry images; structured system or assistant content is reduced to text.
 */
export function toOpenAIMessage(turn: ChatTurn): ChatCompletionMessageParam {
  switch (turn.role) {
    case "system":
      return { role: "system", content: textOf(turn.content) };
    case "assistant":
      return { role: "assistant", content: textOf(turn.content) };
    case "user":
      return {
        role: "user",
        content: typeof turn.content === "string" ? turn.content : turn.content.map(toContentPart),
      };
  }
}

/**
 * Map SDK failures onto relay errors. Anything that is neither a timeout nor
 * an HTTP status from the provider is passed through unchanged.
 */
export function toProviderFailure(error: unknown, requestId?: string): unknown {
  const log = logger.child({ requestId });

  if (error instanceof OpenAI.APIConnectionTimeoutError) {
    log.error("Request to provider timed out");
    return new ProviderTimeoutError({ cause: error });
  }

  if (error instanceof OpenAI.APIError && error.status !== undefined) {
    log.error("Error from provider", { status: error.status, body: error.error });
    return new ProviderError(error.status, { cause: error });
  }

  return error;
}

export class OpenAIClient implements CompletionProvider {
  private config: ProviderConfig;
  private client: OpenAI;

  constructor(config: ProviderConfig, client?: OpenAI) {
    this.config = config;
    this.client =
      client ??
      new OpenAI({
        apiKey: config.apiKey,
        baseURL: config.baseUrl,
        timeout: config.timeoutMs,
        maxRetries: 0,
      });
  }

  /**
   * Send one chat completion request and return the generated text as-is
   */
  async complete(messages: ChatTurn[], options?: CompletionOptions): Promise<string> {
    const log = logger.child({ requestId: options?.requestId });

    log.debug("Sending chat request to provider", {
      model: this.config.model,
      messageCount: messages.length,
    });

    let response: ChatCompletion;
    try {
      response = await this.client.chat.completions.create(
        {
          model: this.config.model,
          messages: messages.map(toOpenAIMessage),
          temperature: this.config.temperature,
          max_tokens: this.config.maxTokens,
        },
        { signal: options?.signal, timeout: this.config.timeoutMs, maxRetries: 0 }
      );
    } catch (error) {
      throw toProviderFailure(error, options?.requestId);
    }

    // An empty string is a valid reply; only a missing one is a failure.
    const textContent = response.choices[0]?.message?.content;
    if (textContent === null || textContent === undefined) {
      throw new Error("No content in response from provider");
    }

    log.info("Received response from provider", {
      model: this.config.model,
      tokens: response.usage?.total_tokens,
      finishReason: response.choices[0]?.finish_reason,
    });

    return textContent;
  }
}
