/**
 * @nostr-delegation/nip26 - Type definitions for delegation tags
 */

// ============================================================================
// Core Types
// ============================================================================

/** Hex-encoded string */
export type Hex = string;

/** Nostr x-only pubkey (32-byte hex) */
export type Pubkey = string;

/** Unsigned 64-bit integer, as used for kinds and unix timestamps */
export type U64 = bigint;

/** Largest value a condition or event property may hold */
export const U64_MAX: U64 = (1n << 64n) - 1n;

// ============================================================================
// Conditions
// ============================================================================

/** A single condition from a delegation's conditions string */
export type Condition =
  | { readonly type: "kind"; readonly kind: U64 } // kind=<k>
  | { readonly type: "created_before"; readonly timestamp: U64 } // created_at<<t>
  | { readonly type: "created_after"; readonly timestamp: U64 }; // created_at><t>

/** Condition discriminants */
export type ConditionType = Condition["type"];

/**
 * Ordered set of conditions.
 *
 * Order is preserved through parsing and formatting, and decides which
 * failure is reported when several conditions would fail.
 */
export type Conditions = readonly Condition[];

/** The event fields a delegation's conditions are evaluated against */
export interface EventProperties {
  /** Event kind */
  readonly kind: U64;
  /** Creation time (unix seconds) */
  readonly createdTime: U64;
}

// ============================================================================
// Delegation Tag Format
// ============================================================================

/** Keyword in the first position of a delegation tag */
export const DELEGATION_KEYWORD = "delegation";

/** Wire form of a delegation tag: ["delegation", delegator, conditions, sig] */
export type DelegationTagArray = [typeof DELEGATION_KEYWORD, Pubkey, string, Hex];

// ============================================================================
// Validation Types
// ============================================================================

/** Reasons a delegation tag does not authorize an event */
export type ValidationError =
  | "InvalidSignature"
  | "InvalidKind"
  | "CreatedTooEarly"
  | "CreatedTooLate";

export const VALIDATION_ERROR_MESSAGES: Record<ValidationError, string> = {
  InvalidSignature: "Signature does not match",
  InvalidKind: "Event kind does not match",
  CreatedTooEarly: "Creation time is earlier than validity period",
  CreatedTooLate: "Creation time is later than validity period",
};

/** Result of validating a delegation tag or evaluating conditions */
export type ValidationResult =
  | { valid: true }
  | { valid: false; error: ValidationError; message: string };

// ============================================================================
// Crypto Capabilities
// ============================================================================

/** Signs delegation digests on behalf of a delegator */
export interface DelegationSigner {
  /** The delegator's x-only pubkey */
  getPublicKey(): Pubkey;
  /** Produce a 64-byte Schnorr signature over a 32-byte digest */
  signDigest(digest: Uint8Array): Uint8Array;
}

/** Checks a 64-byte signature over a 32-byte digest against an x-only pubkey */
export type SignatureVerifier = (
  signature: Uint8Array,
  digest: Uint8Array,
  pubkey: Uint8Array
) => boolean;

/** Options for validating a delegation tag */
export interface ValidateOptions {
  /** Signature verifier (defaults to BIP-340 Schnorr over secp256k1) */
  verifier?: SignatureVerifier;
}
