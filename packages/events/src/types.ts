/**
 * @nostr-delegation/events - Type definitions for delegated events
 */

import {
  VALIDATION_ERROR_MESSAGES,
  type DelegationTag,
  type Pubkey,
  type SignatureVerifier,
  type ValidationError,
} from "@nostr-delegation/nip26";

// ============================================================================
// Validation Types
// ============================================================================

/** Reasons a delegated event is rejected */
export type DelegatedEventError =
  | "InvalidEventSignature" // The event itself is not signed by its pubkey
  | "InvalidEventPubkey" // The event pubkey is not an x-only key
  | "InvalidEventProperties" // kind or created_at is not an unsigned integer
  | "MissingDelegationTag"
  | "MalformedDelegationTag"
  | ValidationError;

export const DELEGATED_EVENT_ERROR_MESSAGES: Record<DelegatedEventError, string> = {
  ...VALIDATION_ERROR_MESSAGES,
  InvalidEventSignature: "Invalid event signature",
  InvalidEventPubkey: "Invalid event pubkey",
  InvalidEventProperties: "Invalid event kind or creation time",
  MissingDelegationTag: "Missing delegation tag",
  MalformedDelegationTag: "Malformed delegation tag",
};

/** Result of validating a delegated event */
export type DelegatedEventValidation =
  | {
      valid: true;
      /** The pubkey the event is published on behalf of */
      delegator: Pubkey;
      /** The delegation tag that authorized it */
      tag: DelegationTag;
    }
  | { valid: false; error: DelegatedEventError; message: string };

// ============================================================================
// Configuration
// ============================================================================

/** Options for validating delegated events */
export interface DelegatedEventOptions {
  /** Verify the event's own signature first (default: true) */
  verifyEventSignature?: boolean;
  /** Delegation signature verifier (default: BIP-340 Schnorr) */
  verifier?: SignatureVerifier;
  /** Where rejections are reported (default: console) */
  logger?: Pick<Console, "warn">;
}
