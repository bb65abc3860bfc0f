/**
 * DSC Engine - Error Types
 *
 * Every failure aborts the whole step. Messages are prefixed with the code so
 * callers (and logs) can match on it without importing the class.
 */

// ============================================================
//                     ENGINE ERRORS
// ============================================================

export type EngineErrorCode =
  // configuration
  | "LengthMismatch"
  | "DuplicateAsset"
  | "InvalidFeed"
  | "InvalidConfig"
  // input validation
  | "InvalidAddress"
  | "InvalidAmount"
  | "UnsupportedAsset"
  // solvency
  | "HealthFactorBroken"
  | "HealthFactorOk"
  | "HealthFactorNotImproved"
  // ledger arithmetic
  | "InsufficientCollateral"
  | "InsufficientDebt"
  // collaborators
  | "TransferFailed"
  | "MintFailed"
  | "StalePrice"
  | "InvalidPrice";

export class EngineError extends Error {
  constructor(
    public readonly code: EngineErrorCode,
    detail: string
  ) {
    super(`${code}: ${detail}`);
    this.name = "EngineError";
  }
}

/** Whose health factor broke: the position owner, or a liquidator after seizing. */
export type HealthFactorRole = "borrower" | "liquidator";

export class HealthFactorBrokenError extends EngineError {
  constructor(
    public readonly account: string,
    public readonly healthFactor: bigint,
    public readonly role: HealthFactorRole
  ) {
    super(
      "HealthFactorBroken",
      role === "liquidator"
        ? `liquidator ${account} would be left with health factor ${healthFactor}`
        : `account ${account} would have health factor ${healthFactor}`
    );
    this.name = "HealthFactorBrokenError";
  }
}

// ============================================================
//                     TOKEN ERRORS
// ============================================================

export type TokenErrorCode =
  | "InsufficientBalance"
  | "InsufficientAllowance"
  | "ZeroAddress"
  | "InvalidAmount"
  | "NotOwner"
  | "BurnAmountExceedsBalance";

export class TokenError extends Error {
  constructor(
    public readonly token: string,
    public readonly code: TokenErrorCode,
    detail: string
  ) {
    super(`${code}: ${detail}`);
    this.name = "TokenError";
  }
}

/** Short error label for logs and metric labels. */
export function errorCode(err: unknown): string {
  if (err instanceof EngineError || err instanceof TokenError) return err.code;
  return "Unknown";
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
