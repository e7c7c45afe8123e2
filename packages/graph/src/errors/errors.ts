/**
 * Custom Error Classes
 */

import type { ZodIssue } from "zod"
import type { EdgeType, NodeType } from "../store/types"

/**
 * Base error for everything the graph and the analytics engine throw.
 */
export class TxGraphError extends Error {
  public override readonly cause?: Error

  constructor(message: string, cause?: Error) {
    super(message)
    this.name = "TxGraphError"
    this.cause = cause

    // V8-specific stack trace capture (not in TypeScript's lib)
    if (typeof (Error as { captureStackTrace?: unknown }).captureStackTrace === "function") {
      ;(Error as { captureStackTrace: (target: Error, ctor: unknown) => void }).captureStackTrace(
        this,
        this.constructor,
      )
    }
  }
}

export type GraphIntegrityReason =
  | "MISSING_ENDPOINT"
  | "ENDPOINT_TYPE_MISMATCH"
  | "NODE_TYPE_CONFLICT"
  | "UNKNOWN_NODE"
  | "INVALID_WEIGHT"

/**
 * Graph integrity error.
 * Thrown when a mutation would violate a structural invariant. Fatal to
 * that single mutation only.
 */
export class GraphIntegrityError extends TxGraphError {
  constructor(
    message: string,
    public readonly reason: GraphIntegrityReason,
    public readonly nodeId?: string,
    public readonly edgeType?: EdgeType,
  ) {
    super(message)
    this.name = "GraphIntegrityError"
  }

  static missingEndpoint(edgeType: EdgeType, role: "source" | "target", nodeId: string) {
    return new GraphIntegrityError(
      `Cannot add ${edgeType} edge: ${role} node '${nodeId}' does not exist`,
      "MISSING_ENDPOINT",
      nodeId,
      edgeType,
    )
  }

  static endpointTypeMismatch(
    edgeType: EdgeType,
    role: "source" | "target",
    nodeId: string,
    expected: NodeType,
    actual: NodeType,
  ) {
    return new GraphIntegrityError(
      `Cannot add ${edgeType} edge: ${role} '${nodeId}' has type ${actual}, expected ${expected}`,
      "ENDPOINT_TYPE_MISMATCH",
      nodeId,
      edgeType,
    )
  }
}

/**
 * Payload validation error.
 * Thrown when a node payload doesn't match its type's schema.
 */
export class PayloadValidationError extends TxGraphError {
  constructor(
    public readonly nodeId: string,
    public readonly nodeType: NodeType,
    public readonly issues: ZodIssue[],
  ) {
    const details = issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ")
    super(`Invalid ${nodeType} payload for '${nodeId}': ${details}`)
    this.name = "PayloadValidationError"
  }
}
