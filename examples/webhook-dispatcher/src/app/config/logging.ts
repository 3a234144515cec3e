import { logLevelNames } from "@confbind/logger"
import { z } from "zod"

export const loggingSchema = z
  .object({
    Level: z.enum(logLevelNames).default("info"),
    Pretty: z.stringbool().default(false),
  })
  .prefault({})

export type LoggingConfig = z.infer<typeof loggingSchema>
