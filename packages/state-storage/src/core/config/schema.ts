import { logLevelNames } from "@statekeep/logger"
import { z } from "zod"
import { hostByteOrder } from "../codec/archive-format"

export const stateStorageConfigSchema = z.object({
  BYTE_ORDER: z.enum(["le", "be"]).default(hostByteOrder()),
  SIZE_WIDTH: z.coerce.number().pipe(z.literal([4, 8])).default(8),
  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: z.union([z.boolean(), z.stringbool()]).default(false),
})

export type StateStorageSettings = z.infer<typeof stateStorageConfigSchema>
