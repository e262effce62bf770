/**
 * @nostr-delegation/nip26 - Key material and Schnorr capabilities
 *
 * Signing and verification use BIP-340 Schnorr signatures over secp256k1
 * from @noble/curves, the same primitives nostr-tools signs events with.
 */

import { schnorr, secp256k1 } from "@noble/curves/secp256k1";
import { bytesToHex } from "@noble/hashes/utils";
import { getPublicKey } from "nostr-tools";

import { DelegationError } from "./errors.js";
import type { DelegationSigner, Hex, Pubkey, SignatureVerifier } from "./types.js";

const PUBKEY_HEX = /^[0-9a-fA-F]{64}$/;
const SIGNATURE_HEX = /^[0-9a-fA-F]{128}$/;

// ============================================================================
// Parsing
// ============================================================================

/**
 * Parse an x-only pubkey, returning it as lowercase hex
 *
 * The key must be 64 hex characters encoding the x coordinate of a point
 * on secp256k1.
 */
export function parsePublicKey(hex: string): Pubkey {
  if (!PUBKEY_HEX.test(hex)) {
    throw new DelegationError(
      "InvalidPublicKey",
      `Invalid public key: expected 64 hex characters, got ${hex.length}`
    );
  }

  const pubkey = hex.toLowerCase();
  try {
    // x-only keys lift to the point with even y
    secp256k1.ProjectivePoint.fromHex("02" + pubkey);
  } catch (err) {
    throw new DelegationError("InvalidPublicKey", "Invalid public key: not a curve point", {
      cause: err,
    });
  }

  return pubkey;
}

/**
 * Parse a Schnorr signature, returning it as lowercase hex
 */
export function parseSignature(hex: string): Hex {
  if (!SIGNATURE_HEX.test(hex)) {
    throw new DelegationError(
      "InvalidSignatureEncoding",
      `Invalid signature: expected 128 hex characters, got ${hex.length}`
    );
  }
  return hex.toLowerCase();
}

// ============================================================================
// Capabilities
// ============================================================================

/**
 * Create a signer that holds a delegator secret key
 */
export function secretKeySigner(secretKey: Uint8Array): DelegationSigner {
  if (secretKey.length !== 32 || !secp256k1.utils.isValidPrivateKey(secretKey)) {
    throw new DelegationError("InvalidSecretKey", "Invalid secret key");
  }

  const pubkey = getPublicKey(secretKey);

  return {
    getPublicKey: () => pubkey,
    signDigest: (digest) => schnorr.sign(digest, secretKey),
  };
}

/** Default verifier: BIP-340 Schnorr over secp256k1 */
export const schnorrVerify: SignatureVerifier = (signature, digest, pubkey) =>
  schnorr.verify(signature, digest, pubkey);

/** Hex-encode signature bytes produced by a signer */
export function encodeSignature(signature: Uint8Array): Hex {
  if (signature.length !== 64) {
    throw new DelegationError(
      "InvalidSignatureEncoding",
      `Invalid signature: expected 64 bytes, got ${signature.length}`
    );
  }
  return bytesToHex(signature);
}
