/**
 * @nostr-delegation/nip26 - Condition grammar and evaluation
 *
 * A conditions string is a list of conditions joined by "&":
 *
 *   kind=1&created_at>1676067553&created_at<1678659553
 *
 * Each condition is one of `kind=<n>`, `created_at<<n>` or `created_at><n>`,
 * where n is an unsigned 64-bit integer.
 */

import { DelegationError } from "./errors.js";
import {
  U64_MAX,
  VALIDATION_ERROR_MESSAGES,
  type Condition,
  type ConditionType,
  type Conditions,
  type EventProperties,
  type U64,
  type ValidationError,
  type ValidationResult,
} from "./types.js";

const CONDITION_SEPARATOR = "&";

const CONDITION_PREFIXES: Record<ConditionType, string> = {
  kind: "kind=",
  created_before: "created_at<",
  created_after: "created_at>",
};

const DECIMAL = /^\+?[0-9]+$/;

// ============================================================================
// Numbers
// ============================================================================

function parseU64(text: string): U64 {
  if (!DECIMAL.test(text)) {
    throw new DelegationError(
      "NumericParseError",
      `Invalid condition, cannot parse expected number: "${text}"`
    );
  }

  const value = BigInt(text.startsWith("+") ? text.slice(1) : text);
  if (value > U64_MAX) {
    throw new DelegationError(
      "NumericParseError",
      `Invalid condition, number too large: "${text}"`
    );
  }

  return value;
}

/**
 * Convert a number or bigint to an unsigned 64-bit value
 */
export function toU64(value: number | bigint): U64 {
  if (typeof value === "number") {
    if (!Number.isSafeInteger(value) || value < 0) {
      throw new DelegationError(
        "NumericParseError",
        `Expected an unsigned integer, got ${value}`
      );
    }
    return BigInt(value);
  }

  if (value < 0n || value > U64_MAX) {
    throw new DelegationError(
      "NumericParseError",
      `Expected an unsigned 64-bit integer, got ${value}`
    );
  }
  return value;
}

// ============================================================================
// Construction
// ============================================================================

/** Event kind must equal `kind` */
export function kindCondition(kind: number | bigint): Condition {
  const condition: Condition = { type: "kind", kind: toU64(kind) };
  return Object.freeze(condition);
}

/** Event must be created strictly before `timestamp` */
export function createdBeforeCondition(timestamp: number | bigint): Condition {
  const condition: Condition = { type: "created_before", timestamp: toU64(timestamp) };
  return Object.freeze(condition);
}

/** Event must be created strictly after `timestamp` */
export function createdAfterCondition(timestamp: number | bigint): Condition {
  const condition: Condition = { type: "created_after", timestamp: toU64(timestamp) };
  return Object.freeze(condition);
}

/**
 * Build the properties of an event for condition evaluation
 */
export function eventProperties(
  kind: number | bigint,
  createdTime: number | bigint
): EventProperties {
  return Object.freeze({ kind: toU64(kind), createdTime: toU64(createdTime) });
}

// ============================================================================
// Parsing & Formatting
// ============================================================================

/**
 * Parse a single condition, e.g. "kind=1" or "created_at<1678659553"
 */
export function parseCondition(text: string): Condition {
  if (text.startsWith(CONDITION_PREFIXES.kind)) {
    return kindCondition(parseU64(text.slice(CONDITION_PREFIXES.kind.length)));
  }
  if (text.startsWith(CONDITION_PREFIXES.created_before)) {
    return createdBeforeCondition(
      parseU64(text.slice(CONDITION_PREFIXES.created_before.length))
    );
  }
  if (text.startsWith(CONDITION_PREFIXES.created_after)) {
    return createdAfterCondition(
      parseU64(text.slice(CONDITION_PREFIXES.created_after.length))
    );
  }

  throw new DelegationError(
    "InvalidConditionSyntax",
    `Invalid condition in conditions string: "${text}"`
  );
}

export function formatCondition(condition: Condition): string {
  switch (condition.type) {
    case "kind":
      return `${CONDITION_PREFIXES.kind}${condition.kind}`;
    case "created_before":
      return `${CONDITION_PREFIXES.created_before}${condition.timestamp}`;
    case "created_after":
      return `${CONDITION_PREFIXES.created_after}${condition.timestamp}`;
  }
}

/**
 * Parse a conditions string
 *
 * The empty string is an empty set of conditions. Any invalid condition
 * fails the whole string.
 */
export function parseConditions(text: string): Conditions {
  if (text === "") {
    return Object.freeze([]);
  }
  return Object.freeze(text.split(CONDITION_SEPARATOR).map(parseCondition));
}

export function formatConditions(conditions: Conditions): string {
  return conditions.map(formatCondition).join(CONDITION_SEPARATOR);
}

// ============================================================================
// Ordering
// ============================================================================

const CONDITION_ORDER: Record<ConditionType, number> = {
  kind: 0,
  created_before: 1,
  created_after: 2,
};

function conditionValue(condition: Condition): U64 {
  return condition.type === "kind" ? condition.kind : condition.timestamp;
}

/**
 * Total order over conditions, by type then value
 *
 * Only for sorting; evaluation always follows the stored order.
 */
export function compareConditions(a: Condition, b: Condition): number {
  const byType = CONDITION_ORDER[a.type] - CONDITION_ORDER[b.type];
  if (byType !== 0) {
    return byType;
  }

  const va = conditionValue(a);
  const vb = conditionValue(b);
  return va < vb ? -1 : va > vb ? 1 : 0;
}

// ============================================================================
// Evaluation
// ============================================================================

export function validationFailure(error: ValidationError): ValidationResult {
  return { valid: false, error, message: VALIDATION_ERROR_MESSAGES[error] };
}

/**
 * Check whether an event satisfies a single condition
 */
export function evaluateCondition(
  condition: Condition,
  props: EventProperties
): ValidationResult {
  switch (condition.type) {
    case "kind":
      if (props.kind !== condition.kind) {
        return validationFailure("InvalidKind");
      }
      break;
    case "created_before":
      if (props.createdTime >= condition.timestamp) {
        return validationFailure("CreatedTooLate");
      }
      break;
    case "created_after":
      if (props.createdTime <= condition.timestamp) {
        return validationFailure("CreatedTooEarly");
      }
      break;
  }
  return { valid: true };
}

/**
 * Check whether an event satisfies all conditions
 *
 * Stops at the first failing condition and reports only that one.
 */
export function evaluateConditions(
  conditions: Conditions,
  props: EventProperties
): ValidationResult {
  for (const condition of conditions) {
    const result = evaluateCondition(condition, props);
    if (!result.valid) {
      return result;
    }
  }
  return { valid: true };
}
