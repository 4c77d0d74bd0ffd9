export type PointerEventsErrorCode =
  | "UNREGISTERED_WINDOW"
  | "NO_DEFAULT_WINDOW"
  | "REENTRANT_DISPATCH";

export class PointerEventsError extends Error {
  readonly code: PointerEventsErrorCode;

  constructor(code: PointerEventsErrorCode, message: string) {
    super(message);
    this.name = "PointerEventsError";
    this.code = code;
  }
}
