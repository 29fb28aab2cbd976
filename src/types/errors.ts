/**
 * Structured Error System for hpl-core
 *
 * Builders and tree operations fail immediately with machine-readable errors
 * carrying a code, the offending node and a suggestion. Validation problems
 * are not exceptions; see diagnostics.ts.
 */

import type { NodeId } from './ast.js';

/**
 * Error codes for construction and tree operations
 */
export type HplErrorCode =
  | 'EmptyName'                 // Channel, alias, field or function name is empty
  | 'InvalidName'               // Name is not an identifier
  | 'InvalidLiteral'            // Literal is not a finite number, string or boolean
  | 'InvalidConnectiveArity'    // And/Or without operands
  | 'InvalidDisjunctionArity'   // Event disjunction with fewer than two events
  | 'NonUniqueDisjunctChannel'  // Two disjuncts listen on the same channel
  | 'InvalidScope'              // Activator/terminator do not match the scope type
  | 'InvalidPattern'            // Trigger missing or unexpected for the pattern
  | 'InvalidTiming'             // Negative, NaN or inverted time window
  | 'InvalidChildKind'          // Replacement node does not fit the slot
  | 'InvalidMetadata'           // Property metadata holds something other than JSON values
  | 'NodeAlreadyOwned'          // Node cannot be moved out of its current parent
  | 'CyclicComposition'         // Node would become its own descendant
  | 'NotAChild'                 // replaceChild target is not an immediate child
  | 'ImmutableNode'             // Tree was frozen by an accepting validation
  | 'RegistryFrozen'            // Function registration after the first validation
  | 'DuplicateFunction'         // Function name registered twice
  | 'InvalidOptions';           // Validator options or channel schemas failed to parse

/**
 * Structured error with code, message and suggestion
 */
export interface HplError {
  code: HplErrorCode;
  message: string;
  suggestion?: string;
  nodeId?: NodeId;
  details?: Record<string, unknown>;
}

/**
 * Exception class wrapping HplError for throw/catch patterns
 */
export class HplException extends Error {
  public readonly error: HplError;

  constructor(error: HplError) {
    super(error.message);
    this.name = 'HplException';
    this.error = error;

    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  get code(): HplErrorCode {
    return this.error.code;
  }

  toJSON(): HplError {
    return this.error;
  }
}

/**
 * Raised by builders when a node violates a local invariant.
 */
export class ConstructionError extends HplException {
  constructor(error: HplError) {
    super(error);
    this.name = 'ConstructionError';
  }
}

const SUGGESTIONS: Partial<Record<HplErrorCode, string>> = {
  InvalidDisjunctionArity: 'Use the single event directly instead of a disjunction',
  NonUniqueDisjunctChannel: 'Merge the disjuncts on this channel into one event with an "or" predicate',
  NodeAlreadyOwned: 'Call duplicate() on the node and attach the copy instead',
  ImmutableNode: 'Duplicate the accepted property and modify the copy',
  RegistryFrozen: 'Register builtin functions before the first validation',
  InvalidMetadata: 'Keep only strings, numbers, booleans, null, arrays and plain objects in metadata',
};

/**
 * Create a construction error with the default suggestion for its code
 */
export function createConstructionError(
  code: HplErrorCode,
  message: string,
  details?: Record<string, unknown>,
  nodeId?: NodeId
): ConstructionError {
  return new ConstructionError({
    code,
    message,
    suggestion: SUGGESTIONS[code],
    nodeId,
    details,
  });
}

/**
 * Create an error for a replaceChild call whose target is not a child
 */
export function createNotAChildError(parentId: NodeId, childId: NodeId): HplException {
  return new HplException({
    code: 'NotAChild',
    message: `Node ${childId} is not a child of node ${parentId}`,
    nodeId: parentId,
    details: { childId },
  });
}

/**
 * Create an error for a mutation of a frozen tree
 */
export function createImmutableNodeError(nodeId: NodeId): HplException {
  return new HplException({
    code: 'ImmutableNode',
    message: `Node ${nodeId} belongs to an accepted property and cannot be modified`,
    suggestion: SUGGESTIONS.ImmutableNode,
    nodeId,
  });
}

/**
 * Create an error for a registration into a frozen function registry
 */
export function createRegistryFrozenError(name: string): HplException {
  return new HplException({
    code: 'RegistryFrozen',
    message: `Cannot register function '${name}': the registry is frozen`,
    suggestion: SUGGESTIONS.RegistryFrozen,
    details: { function: name },
  });
}

/**
 * Create an error for options or schemas that failed to parse
 */
export function createInvalidOptionsError(
  what: string,
  issues: string[]
): HplException {
  return new HplException({
    code: 'InvalidOptions',
    message: `Invalid ${what}: ${issues.join('; ')}`,
    details: { issues },
  });
}

/**
 * Serialize an HplError for JSON output
 */
export function serializeHplError(error: HplError): object {
  return {
    code: error.code,
    message: error.message,
    ...(error.suggestion && { suggestion: error.suggestion }),
    ...(error.nodeId !== undefined && { nodeId: error.nodeId }),
    ...(error.details && { details: error.details }),
  };
}
