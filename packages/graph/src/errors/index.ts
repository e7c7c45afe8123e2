/**
 * Errors Module
 */

export { TxGraphError, GraphIntegrityError, PayloadValidationError } from "./errors"
export type { GraphIntegrityReason } from "./errors"
