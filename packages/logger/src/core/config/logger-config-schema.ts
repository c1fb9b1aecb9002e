import { z } from "zod"
import { logLevelNames } from "../../ports/log-level"

const flag = z.union([
  z.boolean(),
  z
    .enum(["true", "false", "1", "0"])
    .transform((value) => value === "true" || value === "1"),
])

export const logFormats = ["text", "json"] as const

export type LogFormat = (typeof logFormats)[number]

export const loggerConfigSchema = z.object({
  LABEL: z.string().trim().min(1, "LABEL must not be blank"),
  LEVEL: z.enum(logLevelNames).default("debug"),
  WRITE_TO_FILE: flag.default(false),
  DIRECTORY: z.string().min(1).optional(),
  MAX_FILE_COUNT: z.coerce.number().int().nonnegative().default(10),
  MAX_FILE_SIZE: z.coerce.number().int().positive().optional(),
  KEEP_HISTORY: flag.default(false),
  FORMAT: z.enum(logFormats).default("text"),
})

export type LoggerConfigValues = z.infer<typeof loggerConfigSchema>

export type LoggerConfigKey = keyof LoggerConfigValues

export function isConfigKey(key: string): key is LoggerConfigKey {
  return Object.hasOwn(loggerConfigSchema.shape, key)
}
