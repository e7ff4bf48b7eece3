/** An input file could not be read */
export class InputError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = "InputError";
  }
}
