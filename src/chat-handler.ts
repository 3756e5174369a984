import { parseChatRequest } from "./chat-request.js";
import {
  appendReply,
  buildImageMessages,
  buildTextMessages,
  startImageHistory,
} from "./conversation-history.js";
import type { ImageCompressor } from "./image-compressor.js";
import { type Logger, logger } from "./logger.js";
import type {
  ChatResponse,
  CompletionOptions,
  CompletionProvider,
  TurnRequest,
} from "./types.js";

export interface ChatHandlerDeps {
  systemPrompt: string;
  compressor: ImageCompressor;
  provider: CompletionProvider;
}

type TextTurn = Extract<TurnRequest, { kind: "text" }>;
type ImageTurn = Extract<TurnRequest, { kind: "image" }>;

export class ChatHandler {
  private systemPrompt: string;
  private compressor: ImageCompressor;
  private provider: CompletionProvider;

  constructor(deps: ChatHandlerDeps) {
    this.systemPrompt = deps.systemPrompt;
    this.compressor = deps.compressor;
    this.provider = deps.provider;
  }

  /**
   * Run one chat turn: validate, build the provider messages, call the
   * provider once and return the reply with the history to send next time.
   */
  async handle(body: unknown, options: CompletionOptions = {}): Promise<ChatResponse> {
    const request = parseChatRequest(body);
    const log = logger.child({ requestId: options.requestId });

    log.info("Received chat request", {
      kind: request.kind,
      messageLength: request.message.length,
      historyLength: request.kind === "text" ? request.history.length : undefined,
    });

    switch (request.kind) {
      case "text":
        return this.handleText(request, options, log);
      case "image":
        return this.handleImage(request, options, log);
    }
  }

  private async handleText(
    request: TextTurn,
    options: CompletionOptions,
    log: Logger
  ): Promise<ChatResponse> {
    const messages = buildTextMessages(this.systemPrompt, request.history, request.message);
    const reply = await this.provider.complete(messages, options);
    const history = appendReply(this.systemPrompt, request.history, reply);

    log.debug("Text turn completed", {
      sentMessages: messages.length,
      storedTurns: history.length,
      truncated: history.length < request.history.length + 1,
    });

    return { output: reply.trim(), conversation_history: history };
  }

  private async handleImage(
    request: ImageTurn,
    options: CompletionOptions,
    log: Logger
  ): Promise<ChatResponse> {
    const image = await this.compressor.compress(request.image, options.requestId);
    log.info("Image prepared for provider", {
      width: image.width,
      height: image.height,
      bytes: image.bytes,
    });

    const messages = buildImageMessages(this.systemPrompt, request.message, image.base64);
    const reply = await this.provider.complete(messages, options);

    return {
      output: reply.trim(),
      conversation_history: startImageHistory(request.message, reply),
    };
  }
}
