/**
 * packages/core/src/errors.ts — Error type and validation result shape.
 *
 * Why: Layout construction is total except for contract violations the type
 * system cannot rule out (runaway Length nesting, non-finite numbers). Those
 * fail fast with a coded error; precedence conflicts are never errors.
 */

/**
 * Deterministic error codes for contract violations.
 */
export type FlexweaveErrorCode = "FW_INVALID_LENGTH" | "FW_INVALID_PROPS" | "FW_INVALID_STATE";

export class FlexweaveError extends Error {
  override readonly name = "FlexweaveError";
  readonly code: FlexweaveErrorCode;

  constructor(code: FlexweaveErrorCode, message?: string) {
    super(message ?? code);
    this.code = code;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, FlexweaveError);
    }
  }
}

export type ValidationFatal = Readonly<{ code: FlexweaveErrorCode; detail: string }>;

export type ValidationResult<T> =
  | Readonly<{ ok: true; value: T }>
  | Readonly<{ ok: false; fatal: ValidationFatal }>;

export function throwInvalidProps(detail: string): never {
  throw new FlexweaveError("FW_INVALID_PROPS", detail);
}

export function requireFinite(where: string, value: number): number {
  if (!Number.isFinite(value)) {
    throwInvalidProps(`${where}: expected a finite number, got ${String(value)}`);
  }
  return value;
}
