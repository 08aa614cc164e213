import { z } from "zod";

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

export const ValidatorEnvSchema = z.object({
  PROVTAG_LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
  PROVTAG_SERVICE_NAME: z.string().trim().min(1, { message: "Invalid service name" }).default("provtag-validator"),
});

export type ValidatorConfig = {
  logLevel: (typeof LOG_LEVELS)[number];
  serviceName: string;
};

/** Reads validator settings from the environment. Throws a ZodError on bad values. */
export function loadValidatorConfig(env: NodeJS.ProcessEnv = process.env): ValidatorConfig {
  const parsed = ValidatorEnvSchema.parse(env);
  return {
    logLevel: parsed.PROVTAG_LOG_LEVEL,
    serviceName: parsed.PROVTAG_SERVICE_NAME,
  };
}
