/**
 * Schema Module
 */

export {
  blockAttributesSchema,
  transactionAttributesSchema,
  addressAttributesSchema,
  nodePayloadSchema,
} from "./payloads"
export type {
  NodePayload,
  BlockAttributes,
  TransactionAttributes,
  AddressAttributes,
  NodeAttributesInputMap,
} from "./payloads"
