// SPDX-License-Identifier: Apache-2.0

export class BranchworkError extends Error {
  /**
   * Create a custom error object
   *
   * error metadata will include the `cause`
   *
   * @param message error message
   * @param cause source error (if any)
   * @param meta additional metadata (if any)
   */
  public constructor(
    message: string,
    public override readonly cause?: unknown,
    public readonly meta: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
    if (cause instanceof Error) {
      this.stack += `\nCaused by: ${cause.stack}`;
    }
  }
}
