/** A single judge call failed (transport, auth, or an unparseable reply). */
export class AdapterError extends Error {
  constructor(
    public readonly sourceId: string,
    cause: unknown,
  ) {
    super(cause instanceof Error ? cause.message : String(cause), { cause });
    this.name = 'AdapterError';
  }
}

/** The caller passed input the operation cannot work with. */
export class InvalidInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidInputError';
  }
}
