/**
 * Errors Module
 */

export { InsufficientDataError, InvalidParameterError, NotFoundError } from "./errors"
