// ============================================================================
// Shared Helpers - Barrel Export
// ============================================================================

export { toolSuccess, toolError } from './response.js';
export {
  validateArgs,
  toInputSchema,
  requireFields,
  resolveAliases,
  describeViolations,
  isRecord,
  type Violation,
  type ValidatedCall,
} from './validation.js';
export { assertCollectionName, assertFieldPath, fieldRef } from './aql.js';
