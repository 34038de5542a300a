// src/config/binderSettings.ts
/**
 * Purpose:
 * - Typed binder settings from the environment (BINDER_*, LOG_LEVEL), and
 *   the BinderConfig they produce.
 *
 * Env:
 * - BINDER_SKIP_FILLED    "true" | "false"        (default "true")
 * - BINDER_PRESERVE_BODY  "true" | "false"        (default "false")
 * - BINDER_BODY_LIMIT     bytes or "100kb"-style  (default "1mb")
 * - BINDER_SPLIT_SYMBOL   query list separator    (default ",")
 * - LOG_LEVEL             pino level              (default "info")
 *
 * Notes:
 * - Invalid values fail fast with every offending key in one message.
 * - loadBinderSettingsFromFiles() loads env files first (see config/env).
 */

import { z } from "zod";
import type { BinderConfig } from "../binder/Binder";
import {
  defaultDecoders,
  defaultSources,
  defaultTransforms,
} from "../binder/defaults";
import { componentLogger, LOG_LEVELS } from "../logger/logger";
import { DEFAULT_BODY_LIMIT } from "../request/body";
import { DEFAULT_SPLIT_SYMBOL } from "../sources/query.source";
import { loadEnvFilesOrThrow, type EnvFileOptions } from "./env";

const flag = (fallback: "true" | "false") =>
  z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(["true", "false"]))
    .default(fallback)
    .transform((v) => v === "true");

const BinderEnvSchema = z.object({
  BINDER_SKIP_FILLED: flag("true"),
  BINDER_PRESERVE_BODY: flag("false"),
  BINDER_BODY_LIMIT: z
    .string()
    .trim()
    .regex(/^\d+(\.\d+)?\s*(b|kb|mb|gb)?$/i, "expected bytes or e.g. 100kb")
    .default(DEFAULT_BODY_LIMIT)
    .transform((v) => (/^\d+$/.test(v) ? Number(v) : v)),
  BINDER_SPLIT_SYMBOL: z.string().min(1).default(DEFAULT_SPLIT_SYMBOL),
  LOG_LEVEL: z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(LOG_LEVELS))
    .default("info"),
});

export type BinderSettings = {
  skipFilled: boolean;
  preserveBody: boolean;
  bodyLimit: number | string;
  splitSymbol: string;
  logLevel: (typeof LOG_LEVELS)[number];
};

export function loadBinderSettings(
  env: NodeJS.ProcessEnv = process.env
): BinderSettings {
  const parsed = BinderEnvSchema.safeParse(env);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid binder settings: ${detail}`);
  }

  const v = parsed.data;
  return {
    skipFilled: v.BINDER_SKIP_FILLED,
    preserveBody: v.BINDER_PRESERVE_BODY,
    bodyLimit: v.BINDER_BODY_LIMIT,
    splitSymbol: v.BINDER_SPLIT_SYMBOL,
    logLevel: v.LOG_LEVEL,
  };
}

/** Loads `files` into process.env, then reads the settings from it. */
export function loadBinderSettingsFromFiles(
  files: readonly string[],
  opts: EnvFileOptions = {}
): BinderSettings {
  loadEnvFilesOrThrow(files, opts);
  return loadBinderSettings(process.env);
}

/** Default registrations, shaped by `settings`. */
export function binderConfigFrom(settings: BinderSettings): BinderConfig {
  return {
    sources: defaultSources({ splitSymbol: settings.splitSymbol }),
    decoders: defaultDecoders(settings.bodyLimit),
    transforms: defaultTransforms(),
    skipFilled: settings.skipFilled,
    preserveBody: settings.preserveBody,
    bodyLimit: settings.bodyLimit,
    logger: componentLogger("binder").child({}, { level: settings.logLevel }),
  };
}
