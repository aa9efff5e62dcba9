export class ProxyError extends Error {
  /**
   * @param message
   * @param target upstream address the error relates to (if any)
   * @param cause
   */
  constructor(message: string, public readonly target?: string, public readonly cause?: Error) {
    super(message);
    this.name = new.target.name;
  }
}
