export type CatalogErrorCode =
  | "not_found"
  | "validation"
  | "unauthorized"
  | "network"
  | "server"
  | "invalid_response";

export class CatalogError extends Error {
  readonly code: CatalogErrorCode;
  readonly status?: number;

  constructor(
    code: CatalogErrorCode,
    message: string,
    options: { status?: number; cause?: unknown } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = "CatalogError";
    this.code = code;
    this.status = options.status;
  }
}
