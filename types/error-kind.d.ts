/**
 * Distinguishable failure categories carried by every error this tool
 * raises.
 */
export type ErrorKind =
  | 'configuration'
  | 'retriable'
  | 'invariant'
  | 'not-found'
  | 'remote'
  | 'pipe'
