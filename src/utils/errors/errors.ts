export class SearchPreconditionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SearchPreconditionError";
  }
}

export class SearchAbortedError extends Error {
  constructor() {
    super("search aborted");
    this.name = "SearchAbortedError";
  }
}
