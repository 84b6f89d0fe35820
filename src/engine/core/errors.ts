// Errors raised by shape and block construction and by indexed block access.
// Movement that is not possible is never an error.

export class InvalidArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidArgumentError";
  }
}

export class IndexOutOfRangeError extends RangeError {
  constructor(index: number, size: number) {
    super(`Index: ${String(index)}. Size: ${String(size)}`);
    this.name = "IndexOutOfRangeError";
  }
}
