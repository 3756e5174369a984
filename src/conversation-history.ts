import type { ChatTurn } from "./types.js";

/** Stored histories longer than this are cut back on the next reply. */
export const MAX_HISTORY_TURNS = 41;
/** Turns kept after the synthesized system turn when cutting back. */
export const RETAINED_HISTORY_TURNS = 20;

export const IMAGE_HISTORY_PLACEHOLDER = "Image analysis request";
export const DEFAULT_IMAGE_INSTRUCTION =
  "provide a detailed description of this image, focusing on key elements, colors, composition, and any notable features.";

/**
 * Provider messages for a text-only turn. Index 0 of the caller's history is
 * taken to be its copy of the system turn and is dropped whatever its role.
 */
export function buildTextMessages(
  systemPrompt: string,
  history: ChatTurn[],
  message: string
): ChatTurn[] {
  return [
    { role: "system", content: systemPrompt },
    ...history.slice(1),
    { role: "user", content: message },
  ];
}

export function buildImagePrompt(systemPrompt: string, message: string): string {
  return `${systemPrompt}\n\nBased on the above instructions, please ${message || DEFAULT_IMAGE_INSTRUCTION}`;
}

/**
 * Provider messages for an image turn: a single user turn carrying the image
 * and the system instructions folded into its text.
 */
export function buildImageMessages(
  systemPrompt: string,
  message: string,
  jpegBase64: string
): ChatTurn[] {
  return [
    {
      role: "user",
      content: [
        { type: "image_url", image_url: { url: `data:image/jpeg;base64,${jpegBase64}` } },
        { type: "text", text: buildImagePrompt(systemPrompt, message) },
      ],
    },
  ];
}

/**
 * Cap a history at MAX_HISTORY_TURNS: anything longer becomes a fresh system
 * turn followed by the last RETAINED_HISTORY_TURNS turns.
 */
export function truncateHistory(systemPrompt: string, history: ChatTurn[]): ChatTurn[] {
  if (history.length <= MAX_HISTORY_TURNS) {
    return history;
  }
  return [{ role: "system", content: systemPrompt }, ...history.slice(-RETAINED_HISTORY_TURNS)];
}

/**
 * History returned after a text turn: the caller's history as supplied plus
 * the reply. The user's own turn is not added; clients append it themselves.
 */
export function appendReply(systemPrompt: string, history: ChatTurn[], reply: string): ChatTurn[] {
  return truncateHistory(systemPrompt, [...history, { role: "assistant", content: reply }]);
}

/** History returned after an image turn. Earlier turns are discarded. */
export function startImageHistory(message: string, reply: string): ChatTurn[] {
  return [
    { role: "user", content: message || IMAGE_HISTORY_PLACEHOLDER },
    { role: "assistant", content: reply },
  ];
}
