/**
 * Shared colors and glyphs, so every embed and notice the bot sends looks the
 * same.
 */

export const UIColors = {
    success: 0x10b981,    // Green - finished forms, confirmations
    error: 0xef4444,      // Red - canceled forms, failures
    info: 0x6366f1,       // Indigo - forms in progress
} as const;

export const Emoji = {
    success: "✅",
    error: "❌",
    info: "ℹ️",
    arrow_left: "⬅️",
    arrow_right: "➡️",
} as const;

/** Prefixes a notice with the glyph of its severity. */
export function withSeverity(message: string, severity: "info" | "success" | "error"): string {
    return `${Emoji[severity]} ${message}`;
}
