import { createServiceConfig } from "@listval/shared-utils";
import * as dotenv from "dotenv";
import { z } from "zod";

// Load environment variables from .env file
dotenv.config();

const envSchema = z.object({
  INPUT_FILE: z.string().trim().min(1).default("realestates.txt"),
  OUTPUT_FILE: z.string().trim().min(1).default("valuation-report.txt"),
  TARGET_CITY: z.string().trim().min(1).default("Budapest"),
  CURRENCY_LABEL: z.string().trim().default("Ft"),
  SAMPLE_FALLBACK: z
    .enum(["true", "false"])
    .default("false")
    .transform((value) => value === "true"),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

export interface AppConfig {
  mode: string;
  logLevel: "debug" | "info" | "warn" | "error";
  inputFile: string;
  outputFile: string;
  targetCity: string;
  currency: string;
  sampleFallback: boolean;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const service = createServiceConfig(env);
  const parsed = envSchema.safeParse({ ...env, LOG_LEVEL: service.logLevel });

  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join(", ");
    throw new Error(`Invalid configuration: ${problems}`);
  }

  return {
    mode: service.mode,
    logLevel: parsed.data.LOG_LEVEL,
    inputFile: parsed.data.INPUT_FILE,
    outputFile: parsed.data.OUTPUT_FILE,
    targetCity: parsed.data.TARGET_CITY,
    currency: parsed.data.CURRENCY_LABEL,
    sampleFallback: parsed.data.SAMPLE_FALLBACK,
  };
}
