/**
 * Query Parameter Schemas
 *
 * Parameters arrive from a transport layer, often as strings, so numeric
 * strings are converted. Other types are not coerced. Every violation
 * becomes an InvalidParameterError.
 */

import { z } from "zod"
import { InvalidParameterError } from "../errors"

/**
 * Number accepted as-is or from a non-blank numeric string.
 */
function numeric<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((value) => (typeof value === "string" && value.trim() !== "" ? Number(value) : value), schema)
}

export const nodeFilterSchema = z.object({
  nodeType: z.enum(["block", "transaction", "address"]).optional(),
  nodeId: z.string().min(1).optional(),
})

export const activityQuerySchema = nodeFilterSchema.extend({
  colorScheme: z.enum(["heatmap", "activity", "grayscale"]).default("heatmap"),
})

export const anomalyQuerySchema = nodeFilterSchema.extend({
  method: z.enum(["zscore", "percentile", "threshold"]).default("percentile"),
  threshold: numeric(z.number().gt(0).lte(10)).default(2),
})

export const clusterQuerySchema = z.object({
  clusterType: z.enum(["address", "transaction"]),
  timeWindowBlocks: numeric(z.number().int().min(20).max(50)).default(30),
})

export const flowQuerySchema = z
  .object({
    startAddress: z.string().min(1).optional(),
    transactionId: z.string().min(1).optional(),
    maxDepth: numeric(z.number().int().min(1).max(10)).default(5),
    maxBlocks: numeric(z.number().int().min(1).max(10)).default(5),
  })
  .superRefine((value, ctx) => {
    if ((value.startAddress === undefined) === (value.transactionId === undefined)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "exactly one of startAddress or transactionId is required",
        path: ["startAddress"],
      })
    }
  })

export type NodeFilter = z.infer<typeof nodeFilterSchema>
export type ActivityQuery = z.infer<typeof activityQuerySchema>
export type AnomalyQuery = z.infer<typeof anomalyQuerySchema>
export type ClusterQuery = z.infer<typeof clusterQuerySchema>
export type FlowQuery = z.infer<typeof flowQuerySchema>

/**
 * Raw parameters as received: known keys, values not yet validated.
 */
export type RawParams<T> = { [K in keyof T]?: unknown }

/**
 * Validate query parameters.
 *
 * @throws InvalidParameterError
 */
export function parseParams<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input ?? {})
  if (!result.success) {
    throw InvalidParameterError.fromIssues(result.error.issues, isRecord(input) ? input : {})
  }
  return result.data
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null
}
