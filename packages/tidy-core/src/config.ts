import { z } from "zod";

import { TidyError } from "./errors";

export const TOP_STYLES = ["invisible", "keep"] as const;
export const GENERAL_STYLES = ["fringe-marker", "inline-symbol", "invisible"] as const;

export type TopStyle = (typeof TOP_STYLES)[number];
export type GeneralStyle = (typeof GENERAL_STYLES)[number];

const generalDrawersSchema = z
  .object({
    enabled: z.boolean().default(false),
    include: z.array(z.string().min(1)).default([]),
    exclude: z.array(z.string().min(1)).default([]),
  })
  .strict();

export const tidyConfigSchema = z
  .object({
    topStyle: z.enum(TOP_STYLES).default("invisible"),
    generalStyle: z.enum(GENERAL_STYLES).default("inline-symbol"),
    inlineSymbol: z.string().min(1).default("♯"),
    fringeBitmap: z.string().min(1).default("square"),
    protectBoundaries: z.boolean().default(true),
    generalDrawers: generalDrawersSchema.default({}),
  })
  .strict();

export type TidyConfigInput = z.input<typeof tidyConfigSchema>;
export type TidyConfig = Readonly<z.output<typeof tidyConfigSchema>>;
export type GeneralDrawerOptions = z.output<typeof generalDrawersSchema>;

export type TidyConfigResult =
  | { ok: true; config: TidyConfig }
  | { ok: false; issues: string[] };

function formatIssue(issue: z.ZodIssue): string {
  const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
  return `${path}: ${issue.message}`;
}

function freezeConfig(config: z.output<typeof tidyConfigSchema>): TidyConfig {
  Object.freeze(config.generalDrawers.include);
  Object.freeze(config.generalDrawers.exclude);
  Object.freeze(config.generalDrawers);
  return Object.freeze(config);
}

export function safeResolveTidyConfig(input: unknown = {}): TidyConfigResult {
  const parsed = tidyConfigSchema.safeParse(input ?? {});
  if (!parsed.success) {
    return { ok: false, issues: parsed.error.issues.map(formatIssue) };
  }
  return { ok: true, config: freezeConfig(parsed.data) };
}

/**
 * Validate a partial configuration and fill defaults.
 * Throws `INVALID_CONFIG` listing every issue found.
 */
export function resolveTidyConfig(input: unknown = {}): TidyConfig {
  const result = safeResolveTidyConfig(input);
  if (!result.ok) {
    throw new TidyError("INVALID_CONFIG", `Invalid tidy config: ${result.issues.join("; ")}`, {
      context: { issues: result.issues },
    });
  }
  return result.config;
}

export const DEFAULT_TIDY_CONFIG: TidyConfig = resolveTidyConfig();
