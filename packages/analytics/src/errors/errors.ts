/**
 * Analytics Error Types
 *
 * Typed failures surfaced to query callers. Nothing here is approximated:
 * a query either returns a full result or throws one of these.
 */

import { TxGraphError, type NodeType } from "@txgraph/graph"
import type { ZodIssue } from "zod"

/**
 * Error when a statistical sample is too small to evaluate.
 */
export class InsufficientDataError extends TxGraphError {
  constructor(
    public readonly nodeType: NodeType,
    public readonly sampleSize: number,
    public readonly required: number,
  ) {
    super(`Insufficient data: ${nodeType} sample has ${sampleSize} values, at least ${required} required`)
    this.name = "InsufficientDataError"
  }
}

/**
 * Error when a query parameter is out of range or not a known value.
 */
export class InvalidParameterError extends TxGraphError {
  constructor(
    message: string,
    public readonly parameter?: string,
    public readonly received?: unknown,
  ) {
    super(message)
    this.name = "InvalidParameterError"
  }

  static fromIssues(issues: ZodIssue[], input: Record<string, unknown>): InvalidParameterError {
    const first = issues[0]
    const parameter = first && first.path.length > 0 ? first.path.join(".") : undefined
    const details = issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
      .join("; ")
    return new InvalidParameterError(
      `Invalid parameter: ${details}`,
      parameter,
      parameter ? input[parameter] : undefined,
    )
  }
}

/**
 * Error when a seed node for a query doesn't exist.
 */
export class NotFoundError extends TxGraphError {
  constructor(
    public readonly nodeType: NodeType,
    public readonly nodeId: string,
  ) {
    super(`Node not found (${nodeType} with id ${nodeId})`)
    this.name = "NotFoundError"
  }
}
