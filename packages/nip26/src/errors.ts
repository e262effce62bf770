/**
 * @nostr-delegation/nip26 - Errors raised on malformed input
 */

export type DelegationErrorCode =
  | "InvalidConditionSyntax"
  | "NumericParseError"
  | "DelegationTagParse"
  | "InvalidPublicKey"
  | "InvalidSignatureEncoding"
  | "InvalidSecretKey";

/** Delegation tag fields, as named in errors */
export type DelegationTagField = "delegatorPubkey" | "conditions" | "signature";

export class DelegationError extends Error {
  readonly code: DelegationErrorCode;
  /** Which tag element failed to decode, for DelegationTagParse */
  readonly field?: DelegationTagField;

  constructor(
    code: DelegationErrorCode,
    message: string,
    options?: { field?: DelegationTagField; cause?: unknown }
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "DelegationError";
    this.code = code;
    if (options?.field) {
      this.field = options.field;
    }
  }
}

/**
 * Check whether a value is a DelegationError, optionally of a given code
 */
export function isDelegationError(
  err: unknown,
  code?: DelegationErrorCode
): err is DelegationError {
  return err instanceof DelegationError && (code === undefined || err.code === code);
}
