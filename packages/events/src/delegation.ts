/**
 * @nostr-delegation/events - Delegated event handling
 *
 * A delegated event is signed by the delegatee and carries a
 * ["delegation", <delegator>, <conditions>, <sig>] tag authorizing it.
 */

import { finalizeEvent, verifyEvent, type Event, type EventTemplate } from "nostr-tools";
import {
  DELEGATION_KEYWORD,
  DelegationTag,
  eventProperties,
  isDelegationError,
  parsePublicKey,
  type DelegationErrorCode,
  type EventProperties,
  type Pubkey,
} from "@nostr-delegation/nip26";

import {
  DELEGATED_EVENT_ERROR_MESSAGES,
  type DelegatedEventError,
  type DelegatedEventOptions,
  type DelegatedEventValidation,
} from "./types.js";

// ============================================================================
// Tag Access
// ============================================================================

/**
 * Get the event properties delegation conditions are evaluated against
 */
export function eventPropertiesFromEvent(
  event: Pick<Event, "kind" | "created_at">
): EventProperties {
  return eventProperties(event.kind, event.created_at);
}

/**
 * Get the raw delegation tag of an event
 */
export function findDelegationTag(event: Pick<Event, "tags">): string[] | undefined {
  return event.tags.find((t) => t[0] === DELEGATION_KEYWORD);
}

/**
 * Parse the delegation tag of an event
 *
 * Returns null when the event has none, and throws a DelegationError
 * when it is malformed.
 */
export function getDelegationTag(event: Pick<Event, "tags">): DelegationTag | null {
  const tag = findDelegationTag(event);
  return tag ? DelegationTag.fromTag(tag) : null;
}

// ============================================================================
// Event Creation
// ============================================================================

/**
 * Attach a delegation tag to an event template
 *
 * An event carries at most one delegation, so any existing delegation
 * tag is replaced.
 */
export function withDelegationTag<T extends EventTemplate>(template: T, tag: DelegationTag): T {
  return {
    ...template,
    tags: [...template.tags.filter((t) => t[0] !== DELEGATION_KEYWORD), tag.toTag()],
  };
}

/**
 * Attach a delegation tag and sign the event with the delegatee's key
 *
 * The tag is not validated against the event here; use
 * `validateDelegatedEvent` before publishing if in doubt.
 */
export function finalizeDelegatedEvent(
  template: EventTemplate,
  delegateeSecretKey: Uint8Array,
  tag: DelegationTag
): Event {
  return finalizeEvent(withDelegationTag(template, tag), delegateeSecretKey);
}

// ============================================================================
// Event Validation
// ============================================================================

// Event fields that fail to parse, by the error they raise
const REJECTIONS: Partial<Record<DelegationErrorCode, DelegatedEventError>> = {
  InvalidPublicKey: "InvalidEventPubkey",
  NumericParseError: "InvalidEventProperties",
};

function rejected(error: DelegatedEventError): DelegatedEventValidation {
  return { valid: false, error, message: DELEGATED_EVENT_ERROR_MESSAGES[error] };
}

/**
 * Validate a delegated event
 *
 * Checks the event signature, then the delegation tag with the event's
 * author as delegatee and the event's kind and creation time.
 */
export function validateDelegatedEvent(
  event: Event,
  options: DelegatedEventOptions = {}
): DelegatedEventValidation {
  const logger = options.logger ?? console;

  if ((options.verifyEventSignature ?? true) && !verifyEvent(event)) {
    logger.warn("[Delegation] Invalid event signature:", event.id);
    return rejected("InvalidEventSignature");
  }

  let delegatee: Pubkey;
  let props: EventProperties;
  let tag: DelegationTag | null;
  try {
    delegatee = parsePublicKey(event.pubkey);
    props = eventPropertiesFromEvent(event);
    tag = getDelegationTag(event);
  } catch (err) {
    if (!isDelegationError(err)) {
      throw err;
    }
    logger.warn(`[Delegation] Rejected event ${event.id}: ${err.message}`);
    return rejected(REJECTIONS[err.code] ?? "MalformedDelegationTag");
  }

  if (!tag) {
    return rejected("MissingDelegationTag");
  }

  const result = tag.validate(delegatee, props, {
    verifier: options.verifier,
  });
  if (!result.valid) {
    logger.warn(`[Delegation] Rejected delegated event ${event.id}: ${result.message}`);
    return rejected(result.error);
  }

  return { valid: true, delegator: tag.delegatorPubkey, tag };
}

// ============================================================================
// Author Resolution
// ============================================================================

/**
 * Get the pubkey an event is published on behalf of
 *
 * This is the delegator for a validly delegated event, and the event's
 * own pubkey otherwise.
 */
export function getEventAuthor(event: Event, options?: DelegatedEventOptions): Pubkey {
  if (!findDelegationTag(event)) {
    return event.pubkey;
  }

  const result = validateDelegatedEvent(event, options);
  return result.valid ? result.delegator : event.pubkey;
}

/**
 * Check an event against an authors filter, matching delegated events
 * by their delegator as well as their signer
 */
export function eventMatchesAuthors(
  event: Event,
  authors: Pubkey[],
  options?: DelegatedEventOptions
): boolean {
  if (authors.includes(event.pubkey)) {
    return true;
  }
  return authors.includes(getEventAuthor(event, options));
}
