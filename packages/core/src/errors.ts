export type ApiRequestFailure = "network" | "http";

export class ApiRequestError extends Error {
  readonly kind: ApiRequestFailure;
  readonly status: number | null;

  constructor(message: string, kind: ApiRequestFailure, status: number | null = null) {
    super(message);
    this.name = "ApiRequestError";
    this.kind = kind;
    this.status = status;
  }
}

/** The backend answered, but not with a conversations payload we can read. */
export class PayloadError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PayloadError";
  }
}
