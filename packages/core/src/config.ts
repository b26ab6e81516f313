import { z } from "zod";

const SignatureSettingsSchema = z.object({
  maxTokens: z.number().int().min(1).max(64),
  maxLength: z.number().int().min(8).max(512),
  stripPaths: z.boolean(),
  stripNumbers: z.boolean(),
});

export const AnalyzerSettingsSchema = z.object({
  model: z.string().min(1),
  temperature: z.number().min(0).max(2),
  timeoutMs: z.number().int().min(1),
  maxAttempts: z.number().int().min(1).max(10),
  retryBaseDelayMs: z.number().int().min(0),
  maxGroupsInPrompt: z.number().int().min(1),
  maxExamples: z.number().int().min(1).max(20),
  maxExampleLength: z.number().int().min(16),
  topRootCauses: z.number().int().min(1),
  signature: SignatureSettingsSchema,
});

export type AnalyzerSettings = z.infer<typeof AnalyzerSettingsSchema>;
export type SignatureSettings = z.infer<typeof SignatureSettingsSchema>;

export type SettingsOverrides = Partial<Omit<AnalyzerSettings, "signature">> & {
  signature?: Partial<SignatureSettings>;
};

export const DEFAULT_SETTINGS: AnalyzerSettings = {
  model: "gemini-1.5-flash",
  temperature: 0.2,
  timeoutMs: 60_000,
  maxAttempts: 3,
  retryBaseDelayMs: 500,
  maxGroupsInPrompt: 25,
  maxExamples: 3,
  maxExampleLength: 300,
  topRootCauses: 3,
  signature: {
    maxTokens: 8,
    maxLength: 96,
    stripPaths: true,
    stripNumbers: true,
  },
};

type Env = Record<string, string | undefined>;

/**
 * Resolve settings: explicit overrides, then LOGSIFT_* environment variables,
 * then defaults. Throws a ZodError listing every invalid field.
 */
export function loadSettings(env: Env = process.env, overrides: SettingsOverrides = {}): AnalyzerSettings {
  const fromEnv = {
    model: env.LOGSIFT_MODEL,
    temperature: num(env.LOGSIFT_TEMPERATURE),
    timeoutMs: num(env.LOGSIFT_TIMEOUT_MS),
    maxAttempts: num(env.LOGSIFT_MAX_ATTEMPTS),
    retryBaseDelayMs: num(env.LOGSIFT_RETRY_BASE_DELAY_MS),
    maxGroupsInPrompt: num(env.LOGSIFT_MAX_GROUPS),
    maxExamples: num(env.LOGSIFT_MAX_EXAMPLES),
    maxExampleLength: num(env.LOGSIFT_MAX_EXAMPLE_LENGTH),
    topRootCauses: num(env.LOGSIFT_TOP_ROOT_CAUSES),
  };
  const signatureFromEnv = {
    maxTokens: num(env.LOGSIFT_SIGNATURE_MAX_TOKENS),
    maxLength: num(env.LOGSIFT_SIGNATURE_MAX_LENGTH),
    stripPaths: bool(env.LOGSIFT_SIGNATURE_STRIP_PATHS),
    stripNumbers: bool(env.LOGSIFT_SIGNATURE_STRIP_NUMBERS),
  };

  const { signature: signatureOverrides, ...rest } = overrides;
  const merged = {
    ...DEFAULT_SETTINGS,
    ...defined(fromEnv),
    ...defined(rest),
    signature: {
      ...DEFAULT_SETTINGS.signature,
      ...defined(signatureFromEnv),
      ...defined(signatureOverrides ?? {}),
    },
  };
  return AnalyzerSettingsSchema.parse(merged);
}

/* ---------------- helpers ---------------- */

function num(v: string | undefined): number | undefined {
  if (v === undefined || v.trim() === "") return undefined;
  // NaN is left for the schema to reject with a field name
  return Number(v);
}

function bool(v: string | undefined): boolean | undefined {
  if (v === undefined) return undefined;
  return /^(1|true|yes|on)$/i.test(v.trim());
}

function defined(obj: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(obj).filter(([, v]) => v !== undefined));
}
