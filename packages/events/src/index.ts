// @nostr-delegation/events - Delegated nostr events

// Types
export * from "./types.js";

export {
  // Tag access
  eventPropertiesFromEvent,
  findDelegationTag,
  getDelegationTag,
  // Event creation
  withDelegationTag,
  finalizeDelegatedEvent,
  // Event validation
  validateDelegatedEvent,
  // Author resolution
  getEventAuthor,
  eventMatchesAuthors,
} from "./delegation.js";
