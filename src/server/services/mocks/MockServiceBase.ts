/**
 * Base class for scripted mock services
 *
 * Responses and errors are queued per key and consumed in order; once a key's queue is
 * empty the default error, then the default response, applies.
 */

export type MockStep<TResponse, TError> = { kind: 'response'; value: TResponse } | { kind: 'error'; value: TError };

export abstract class MockServiceBase<TResponse = unknown, TError = Error> {
  protected scripts: Map<string, Array<MockStep<TResponse, TError>>> = new Map();
  protected defaultResponse: TResponse | null = null;
  protected defaultError: TError | null = null;

  /**
   * Get the service name (for logging/debugging)
   */
  abstract getServiceName(): string;

  /**
   * Queue a response for a key
   */
  enqueueResponse(key: string, response: TResponse): this {
    this.queueFor(key).push({ kind: 'response', value: response });
    return this;
  }

  /**
   * Queue an error for a key
   */
  enqueueError(key: string, error: TError): this {
    this.queueFor(key).push({ kind: 'error', value: error });
    return this;
  }

  setDefaultResponse(response: TResponse): void {
    this.defaultResponse = response;
  }

  setDefaultError(error: TError): void {
    this.defaultError = error;
  }

  /**
   * Take the next step for a key, or null when nothing is scripted
   */
  protected nextStep(key: string): MockStep<TResponse, TError> | null {
    const queued = this.scripts.get(key)?.shift();
    if (queued) return queued;
    if (this.defaultError !== null) return { kind: 'error', value: this.defaultError };
    if (this.defaultResponse !== null) return { kind: 'response', value: this.defaultResponse };
    return null;
  }

  private queueFor(key: string): Array<MockStep<TResponse, TError>> {
    let queue = this.scripts.get(key);
    if (!queue) {
      queue = [];
      this.scripts.set(key, queue);
    }
    return queue;
  }
}
