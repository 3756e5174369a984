export type LogLevel = "debug" | "info" | "warn" | "error";

export type ChatRole = "system" | "user" | "assistant";

export interface TextPart {
  type: "text";
  text: string;
}

export interface ImagePart {
  type: "image_url";
  image_url: { url: string };
}

export type ContentPart = TextPart | ImagePart;

export interface ChatTurn {
  role: ChatRole;
  content: string | ContentPart[];
}

export interface ProviderConfig {
  apiKey: string;
  baseUrl: string;
  model: string;
  temperature: number;
  maxTokens: number;
  timeoutMs: number;
}

export interface ImageConfig {
  maxPixels: number;
  jpegQuality: number;
}

export interface RelayConfig {
  provider: ProviderConfig;
  image: ImageConfig;
  systemPrompt: string;
  httpPort: number;
  host: string;
  bodyLimit: string;
  logLevel: LogLevel;
}

/**
 * Inbound request after validation. Image turns never consult the
 * caller's history, so that variant does not carry one.
 */
export type TurnRequest =
  | { kind: "text"; message: string; history: ChatTurn[] }
  | { kind: "image"; message: string; image: string };

export interface ChatResponse {
  output: string;
  conversation_history: ChatTurn[];
}

export interface CompressedImage {
  base64: string;
  width: number;
  height: number;
  bytes: number;
}

export interface CompletionOptions {
  signal?: AbortSignal;
  requestId?: string;
}

export interface CompletionProvider {
  complete(messages: ChatTurn[], options?: CompletionOptions): Promise<string>;
}
