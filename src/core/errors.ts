/** The dataset could not be read or its timestamps could not be parsed. */
export class LoadError extends Error {
  constructor(message: string, readonly source: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "LoadError";
  }
}

export class InvalidCriteriaError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidCriteriaError";
  }
}

export class InvalidFunnelError extends Error {
  constructor(message: string, readonly duplicates: string[]) {
    super(message);
    this.name = "InvalidFunnelError";
  }
}
