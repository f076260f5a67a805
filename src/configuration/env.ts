/**
 * Process environment, validated once at startup.
 *
 * `BOT_TOKEN` is only needed to connect; the form timeouts have defaults so
 * tests and tooling can load this module with an empty environment.
 */
import { z } from "zod";

export const EnvSchema = z.object({
    BOT_TOKEN: z.string().min(1).optional(),
    FORM_TIMEOUT_SECONDS: z.coerce.number().int().positive().default(180),
    PROMPT_TIMEOUT_SECONDS: z.coerce.number().int().positive().default(120),
});

export type Env = z.infer<typeof EnvSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
    const parsed = EnvSchema.safeParse(source);
    if (!parsed.success) {
        const issues = parsed.error.issues
            .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
            .join("; ");
        throw new Error(`[config] Invalid environment: ${issues}`);
    }
    return parsed.data;
}

/** Form timeouts in milliseconds. */
export function formTimeouts(env: Env = loadEnv()): { formMs: number; promptMs: number } {
    return {
        formMs: env.FORM_TIMEOUT_SECONDS * 1000,
        promptMs: env.PROMPT_TIMEOUT_SECONDS * 1000,
    };
}
