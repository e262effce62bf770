// @nostr-delegation/nip26 - NIP-26 delegated event signing

// Types
export * from "./types.js";

// Errors
export {
  DelegationError,
  isDelegationError,
  type DelegationErrorCode,
  type DelegationTagField,
} from "./errors.js";

// Conditions - grammar and evaluation
export {
  // Construction
  kindCondition,
  createdBeforeCondition,
  createdAfterCondition,
  eventProperties,
  toU64,
  // Parsing & formatting
  parseCondition,
  formatCondition,
  parseConditions,
  formatConditions,
  // Ordering
  compareConditions,
  // Evaluation
  evaluateCondition,
  evaluateConditions,
  validationFailure,
} from "./conditions.js";

// Token
export { delegationToken, delegationDigest } from "./token.js";

// Keys & crypto capabilities
export {
  parsePublicKey,
  parseSignature,
  secretKeySigner,
  schnorrVerify,
  encodeSignature,
} from "./keys.js";

// Delegation tag
export {
  DelegationTag,
  createDelegationTag,
  validateDelegationTag,
  signDelegation,
  verifyDelegationSignature,
} from "./tag.js";
