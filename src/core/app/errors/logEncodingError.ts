export class LogEncodingError extends Error {
  constructor(
    public readonly path: string,
    public readonly reason: string,
  ) {
    super(`Cannot encode value at "${path}": ${reason}.`);
    this.name = 'LogEncodingError';
  }
}
