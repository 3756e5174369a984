import { z } from "zod";
import { InvalidRequestError } from "./errors.js";
import type { TurnRequest } from "./types.js";

const contentPartSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("text"), text: z.string() }),
  z.object({ type: z.literal("image_url"), image_url: z.object({ url: z.string() }) }),
]);

// Extra turn fields (e.g. `name`) are kept so the history round-trips unchanged.
export const chatTurnSchema = z
  .object({
    role: z.enum(["system", "user", "assistant"]),
    content: z.union([z.string(), z.array(contentPartSchema)]),
  })
  .passthrough();

export const chatRequestSchema = z.object({
  message: z
    .string()
    .nullish()
    .transform((value) => (value ?? "").trim()),
  image: z.string().nullish(),
  conversation_history: z
    .array(chatTurnSchema)
    .nullish()
    .transform((value) => value ?? []),
});

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const field = issue.path.length > 0 ? issue.path.join(".") : "body";
      return `${field}: ${issue.message}`;
    })
    .join("; ");
}

/**
 * Validate a decoded JSON body and sort it into a text or an image turn.
 */
export function parseChatRequest(body: unknown): TurnRequest {
  if (typeof body !== "object" || body === null || Array.isArray(body)) {
    throw new InvalidRequestError("Request body must be a JSON object");
  }

  const result = chatRequestSchema.safeParse(body);
  if (!result.success) {
    throw new InvalidRequestError(`Invalid request: ${describeIssues(result.error)}`);
  }

  const { message, image, conversation_history: history } = result.data;
  if (image) {
    return { kind: "image", message, image };
  }
  return { kind: "text", message, history };
}
