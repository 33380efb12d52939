export class LaminaError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The parent handed to `store()` or chosen by a copy cannot own objects of this kind. */
export class InvalidParentError extends LaminaError {}

/** A server-computed value was read before the server produced it. */
export class NotAvailableError extends LaminaError {}

/** A link or copy would make objects of one model refer into another model. */
export class CrossModelLinkError extends LaminaError {}

/** Raised by the server when stored field values break a cross-field rule. */
export class ConsistencyError extends LaminaError {}

export class AlreadyStoredError extends LaminaError {}

export class UnstoredObjectError extends LaminaError {}

/** A copied object's parent is neither mapped by the caller nor part of the copy. */
export class MissingParentError extends LaminaError {}

export type RemoteErrorCode = "NOT_FOUND" | "INVALID_ARGUMENT" | "UNAVAILABLE" | "UNKNOWN";

export class RemoteError extends LaminaError {
  readonly code: RemoteErrorCode;

  constructor(message: string, code: RemoteErrorCode = "UNKNOWN", options?: ErrorOptions) {
    super(message, options);
    this.code = code;
  }
}
