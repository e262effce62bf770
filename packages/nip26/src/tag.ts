/**
 * @nostr-delegation/nip26 - Delegation tag creation, validation and encoding
 */

import { hexToBytes } from "@noble/hashes/utils";

import { evaluateConditions, formatConditions, parseConditions, validationFailure } from "./conditions.js";
import { DelegationError, type DelegationTagField } from "./errors.js";
import { encodeSignature, parsePublicKey, parseSignature, schnorrVerify, secretKeySigner } from "./keys.js";
import { delegationDigest } from "./token.js";
import {
  DELEGATION_KEYWORD,
  type Conditions,
  type DelegationSigner,
  type DelegationTagArray,
  type EventProperties,
  type Hex,
  type Pubkey,
  type SignatureVerifier,
  type ValidateOptions,
  type ValidationResult,
} from "./types.js";

// ============================================================================
// Signing & Verification
// ============================================================================

function toSigner(signer: DelegationSigner | Uint8Array): DelegationSigner {
  return signer instanceof Uint8Array ? secretKeySigner(signer) : signer;
}

/**
 * Sign a delegation token for a delegatee and conditions string
 *
 * The conditions string is signed exactly as given. See `DelegationTag.create`
 * for the complete tag.
 */
export function signDelegation(
  signer: DelegationSigner | Uint8Array,
  delegateePubkey: Pubkey,
  conditions: string
): Hex {
  const digest = delegationDigest(parsePublicKey(delegateePubkey), conditions);
  return encodeSignature(toSigner(signer).signDigest(digest));
}

/**
 * Verify a delegation signature
 *
 * Returns false for any failure, including a malformed signature or
 * delegator pubkey, without saying which.
 */
export function verifyDelegationSignature(
  delegatorPubkey: Pubkey,
  signature: Hex,
  delegateePubkey: Pubkey,
  conditions: string,
  verifier: SignatureVerifier = schnorrVerify
): boolean {
  const digest = delegationDigest(parsePublicKey(delegateePubkey), conditions);
  try {
    return verifier(hexToBytes(signature), digest, hexToBytes(delegatorPubkey));
  } catch {
    return false;
  }
}

// ============================================================================
// Delegation Tag
// ============================================================================

function isTagTuple(tag: readonly string[]): tag is readonly [string, string, string, string] {
  return tag.length === 4;
}

function parseField<T>(field: DelegationTagField, parse: () => T): T {
  try {
    return parse();
  } catch (err) {
    throw new DelegationError("DelegationTagParse", `Delegation tag parse error: invalid ${field}`, {
      field,
      cause: err,
    });
  }
}

/**
 * A NIP-26 delegation tag
 *
 * Tags from `create` carry a fresh signature. Tags parsed with `fromJson`
 * or `fromTag` are unverified claims until `validate` passes for the
 * delegatee and event in question.
 */
export class DelegationTag {
  readonly delegatorPubkey: Pubkey;
  readonly conditions: Conditions;
  readonly signature: Hex;

  private constructor(delegatorPubkey: Pubkey, conditions: Conditions, signature: Hex) {
    this.delegatorPubkey = delegatorPubkey;
    this.conditions = Object.freeze([...conditions]);
    this.signature = signature;
    Object.freeze(this);
  }

  /**
   * Create a delegation tag, signing the conditions for the delegatee
   */
  static create(
    signer: DelegationSigner | Uint8Array,
    delegateePubkey: Pubkey,
    conditions: string
  ): DelegationTag {
    const parsed = parseConditions(conditions);
    const delegator = toSigner(signer);
    const signature = signDelegation(delegator, delegateePubkey, conditions);

    return new DelegationTag(parsePublicKey(delegator.getPublicKey()), parsed, signature);
  }

  /**
   * Parse a tag from its array form, without verifying it
   */
  static fromTag(tag: readonly string[]): DelegationTag {
    if (!isTagTuple(tag)) {
      throw new DelegationError(
        "DelegationTagParse",
        `Delegation tag parse error: expected 4 elements, got ${tag.length}`
      );
    }

    const [keyword, delegator, conditions, signature] = tag;
    if (keyword !== DELEGATION_KEYWORD) {
      throw new DelegationError(
        "DelegationTagParse",
        `Delegation tag parse error: expected "${DELEGATION_KEYWORD}", got "${keyword}"`
      );
    }

    return new DelegationTag(
      parseField("delegatorPubkey", () => parsePublicKey(delegator)),
      parseField("conditions", () => parseConditions(conditions)),
      parseField("signature", () => parseSignature(signature))
    );
  }

  /**
   * Parse a tag from its JSON form, without verifying it
   */
  static fromJson(json: string): DelegationTag {
    let value: unknown;
    try {
      value = JSON.parse(json);
    } catch (err) {
      throw new DelegationError("DelegationTagParse", "Delegation tag parse error: invalid JSON", {
        cause: err,
      });
    }

    if (!Array.isArray(value) || !value.every((v): v is string => typeof v === "string")) {
      throw new DelegationError(
        "DelegationTagParse",
        "Delegation tag parse error: expected an array of strings"
      );
    }

    return DelegationTag.fromTag(value);
  }

  /**
   * Check the signature for this delegatee, then the conditions against the event
   *
   * Conditions are only evaluated once the signature has verified.
   */
  validate(
    delegateePubkey: Pubkey,
    props: EventProperties,
    options: ValidateOptions = {}
  ): ValidationResult {
    const verified = verifyDelegationSignature(
      this.delegatorPubkey,
      this.signature,
      delegateePubkey,
      formatConditions(this.conditions),
      options.verifier
    );
    if (!verified) {
      return validationFailure("InvalidSignature");
    }

    return evaluateConditions(this.conditions, props);
  }

  toTag(): DelegationTagArray {
    return [DELEGATION_KEYWORD, this.delegatorPubkey, formatConditions(this.conditions), this.signature];
  }

  toJson(): string {
    return JSON.stringify(this.toTag());
  }

  toString(): string {
    return this.toJson();
  }

  equals(other: DelegationTag): boolean {
    return this.toJson() === other.toJson();
  }
}

// ============================================================================
// Convenience Functions
// ============================================================================

/**
 * Create a delegation tag (including the signature)
 */
export function createDelegationTag(
  signer: DelegationSigner | Uint8Array,
  delegateePubkey: Pubkey,
  conditions: string
): DelegationTag {
  return DelegationTag.create(signer, delegateePubkey, conditions);
}

/**
 * Validate a delegation tag: signature first, then conditions
 */
export function validateDelegationTag(
  tag: DelegationTag,
  delegateePubkey: Pubkey,
  props: EventProperties,
  options?: ValidateOptions
): ValidationResult {
  return tag.validate(delegateePubkey, props, options);
}
