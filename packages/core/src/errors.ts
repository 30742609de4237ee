/**
 * sublisp runtime errors.
 */
export type EvalErrorCode =
  | "E_MALFORMED"
  | "E_NOT_PROC"
  | "E_UNBOUND"
  | "E_NATIVE"
  | "E_DEPTH"
  | "E_BUDGET"
  | "E_ARITY";

export type ErrorDetails = Record<string, string | number | boolean>;

export class EvalError extends Error {
  code: EvalErrorCode;
  details?: ErrorDetails;

  constructor(code: EvalErrorCode, message: string, details?: ErrorDetails) {
    super(message);
    this.name = "EvalError";
    this.code = code;
    this.details = details;
  }
}
