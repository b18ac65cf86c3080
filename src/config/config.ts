import { z } from "zod";
import { LOG_LEVELS, type LogLevel } from "../logging.js";
import type { OtpAlgorithm } from "../otp/generator.js";

const upperCase = (value: unknown) => (typeof value === "string" ? value.toUpperCase() : value);

const ConfigSchema = z.object({
  ONETIME_ALGORITHM: z.preprocess(upperCase, z.enum(["SHA1", "SHA256", "SHA512"]).default("SHA1")),
  // Defaults for generated codes follow the advisory range, not the hard 1-9 limit.
  ONETIME_DIGITS: z.coerce.number().int().min(6).max(8).default(6),
  ONETIME_PERIOD: z.coerce.number().gt(0).max(300).default(30),
  ONETIME_LOG_LEVEL: z.enum(LOG_LEVELS).default("warn"),
});

export type OtpConfig = {
  algorithm: OtpAlgorithm;
  digits: number;
  period: number;
  logLevel: LogLevel;
};

/** Parse CLI defaults from the environment. Throws a ZodError on invalid values. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): OtpConfig {
  const parsed = ConfigSchema.parse(env);
  return {
    algorithm: parsed.ONETIME_ALGORITHM,
    digits: parsed.ONETIME_DIGITS,
    period: parsed.ONETIME_PERIOD,
    logLevel: parsed.ONETIME_LOG_LEVEL,
  };
}
