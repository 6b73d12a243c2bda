import { MAX_PAGE_COUNT, replacementPolicies } from "@pagesim/paging"
import { z } from "zod/mini"

/** Path segment holding a non-negative integer, e.g. `"3"`. */
const indexParam = (label: string) =>
  z.pipe(
    z.string().check(z.regex(/^\d+$/, { error: `${label} must be a non-negative integer` })),
    z.transform((value: string) => Number(value)),
  )

const policy = z.optional(z.enum(replacementPolicies, { error: 'Policy must be "fifo" or "lru"' }))

export const processParamsSchema = z.object({
  pid: indexParam("Process id"),
})

export const pageParamsSchema = z.object({
  pid: indexParam("Process id"),
  page: indexParam("Page number"),
})

export const createProcessRequestSchema = z.object({
  pageCount: z.optional(
    z.int({ error: "Page count must be an integer" }).check(
      z.gte(1, { error: "Page count must be at least 1" }),
      z.lte(MAX_PAGE_COUNT, { error: `Page count cannot exceed ${MAX_PAGE_COUNT}` }),
    ),
  ),
})

export const accessRequestSchema = z.object({ policy })

export type ProcessParams = z.infer<typeof processParamsSchema>
export type PageParams = z.infer<typeof pageParamsSchema>
export type CreateProcessRequest = z.infer<typeof createProcessRequestSchema>
export type AccessRequestBody = z.infer<typeof accessRequestSchema>
