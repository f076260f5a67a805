import * as nodeEmoji from "node-emoji";
import { ErrResult, OkResult, type Result } from "@/utils/result";

export type ParsedEmoji =
  | { kind: "custom"; name: string; id: string; animated: boolean }
  | { kind: "unicode"; emoji: string; shortcode: string | null };

const CUSTOM_EMOJI = /^<(a?):(\w{2,32}):(\d{15,25})>$/;
// Unicode sequences node-emoji has no name for (flags, skin tones, ZWJ).
const PICTOGRAPHIC_SEQUENCE =
  /^(?:\p{Extended_Pictographic}|\p{Regional_Indicator}|\p{Emoji_Modifier}|\u200D|\uFE0F)+$/u;

/**
 * Parses Discord custom markup (`<:name:id>`, `<a:name:id>`), a raw unicode
 * emoji or a shortcode (`:fire:` / `fire`).
 */
export function parseEmoji(raw: string): Result<ParsedEmoji> {
  const input = raw.trim();
  if (!input) return ErrResult(new Error("empty emoji"));

  const custom = CUSTOM_EMOJI.exec(input);
  if (custom) {
    return OkResult({
      kind: "custom",
      animated: custom[1] === "a",
      name: custom[2],
      id: custom[3],
    });
  }

  const known = nodeEmoji.find(input);
  if (known) {
    return OkResult({ kind: "unicode", emoji: known.emoji, shortcode: known.key });
  }

  if (PICTOGRAPHIC_SEQUENCE.test(input)) {
    return OkResult({ kind: "unicode", emoji: input, shortcode: null });
  }

  return ErrResult(new Error(`unknown emoji: ${input}`));
}

/** Renders a parsed emoji the way Discord expects it in message content. */
export function formatEmoji(emoji: ParsedEmoji): string {
  if (emoji.kind === "unicode") return emoji.emoji;
  return `<${emoji.animated ? "a" : ""}:${emoji.name}:${emoji.id}>`;
}
