import { z } from "zod"

const flag = z.union([z.boolean(), z.stringbool()])

/** Accepts a comma-separated string, as variables deliver lists. */
const idList = z.preprocess(
  (value) => (typeof value === "string" ? value.split(",").filter(Boolean) : value),
  z.array(z.coerce.number().int()),
)

export const settingsSchema = z.object({
  format: z.enum(["json", "text"]).default("text"),
  verbosity: z.coerce.number().int().nonnegative().default(0),
  color: flag.default(true),

  subcommand: z
    .object({
      flag: flag.default(false),
      ids: idList.default([]),
    })
    .optional(),
})

export type Settings = z.infer<typeof settingsSchema>
