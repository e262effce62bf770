/**
 * @nostr-delegation/nip26 - Delegation token
 */

import { sha256 } from "@noble/hashes/sha256";
import { utf8ToBytes } from "@noble/hashes/utils";

import { DELEGATION_KEYWORD, type Pubkey } from "./types.js";

/**
 * Compile the delegation token that the delegator signs:
 *
 *   nostr:delegation:<delegatee pubkey>:<conditions string>
 *
 * Verifiers rebuild this string byte for byte, so the pubkey must already
 * be lowercase hex.
 */
export function delegationToken(delegateePubkey: Pubkey, conditions: string): string {
  return `nostr:${DELEGATION_KEYWORD}:${delegateePubkey}:${conditions}`;
}

/**
 * SHA-256 of the UTF-8 encoded delegation token
 */
export function delegationDigest(delegateePubkey: Pubkey, conditions: string): Uint8Array {
  return sha256(utf8ToBytes(delegationToken(delegateePubkey, conditions)));
}
