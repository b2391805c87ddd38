// pattern: Functional Core

export type HttpResult = {
  readonly status: number;
  readonly body: unknown;
};

export type ErrorResponse = {
  readonly date: string;
  readonly status: number;
  readonly message: string;
  readonly path: string;
};

export class HttpError extends Error {
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = "HttpError";
    this.status = status;
  }
}
