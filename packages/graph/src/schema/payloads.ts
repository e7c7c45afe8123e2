/**
 * Node Payload Schemas
 *
 * Zod schemas for the type-specific attribute payload each node carries.
 * Every `addNode` call runs its payload through these before storing it.
 */

import { z } from "zod"

// =============================================================================
// PER-TYPE PAYLOADS
// =============================================================================

export const blockAttributesSchema = z.object({
  /** Block number in the chain */
  height: z.number().int().nonnegative(),
  /** ISO-8601 creation time */
  timestamp: z.string(),
  slot: z.number().int().nonnegative().optional(),
  /** Transaction count reported by the upstream source */
  txCount: z.number().int().nonnegative().optional(),
})

export const transactionAttributesSchema = z.object({
  /** Fee in minor currency units */
  fee: z.number().nonnegative().default(0),
  /** Sum of all outputs in minor currency units */
  totalValue: z.number().nonnegative().default(0),
  blockHeight: z.number().int().nonnegative().optional(),
  timestamp: z.string().optional(),
})

export const addressAttributesSchema = z.object({
  utxoCount: z.number().int().nonnegative().default(0),
  totalReceived: z.number().nonnegative().default(0),
  totalSent: z.number().nonnegative().default(0),
  transactionCount: z.number().int().nonnegative().default(0),
  firstSeen: z.string().optional(),
})

// =============================================================================
// TAGGED PAYLOAD
// =============================================================================

/**
 * Payload tagged by node type. Parsing narrows `attributes` to the
 * record that belongs to `type`.
 */
export const nodePayloadSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("block"), attributes: blockAttributesSchema }),
  z.object({ type: z.literal("transaction"), attributes: transactionAttributesSchema }),
  z.object({ type: z.literal("address"), attributes: addressAttributesSchema }),
])

export type NodePayload = z.infer<typeof nodePayloadSchema>

export type BlockAttributes = z.infer<typeof blockAttributesSchema>
export type TransactionAttributes = z.infer<typeof transactionAttributesSchema>
export type AddressAttributes = z.infer<typeof addressAttributesSchema>

/**
 * Attribute shapes accepted by `addNode`, before defaults are applied.
 */
export interface NodeAttributesInputMap {
  block: z.input<typeof blockAttributesSchema>
  transaction: z.input<typeof transactionAttributesSchema>
  address: z.input<typeof addressAttributesSchema>
}
