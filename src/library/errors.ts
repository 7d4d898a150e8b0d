export type LibraryErrorCode = "not_found" | "conflict" | "forbidden" | "validation";

export class LibraryError extends Error {
  constructor(
    readonly code: LibraryErrorCode,
    message: string
  ) {
    super(message);
    this.name = "LibraryError";
  }
}

export function httpStatusFor(code: LibraryErrorCode): number {
  switch (code) {
    case "not_found":
      return 404;
    case "conflict":
      return 409;
    case "forbidden":
      return 403;
    case "validation":
      return 400;
  }
}
