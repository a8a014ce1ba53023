export class UnsupportedDialectError extends Error {
  constructor(public dialect: string) {
    super(`Unsupported dialect: ${dialect}`);
    this.name = 'UnsupportedDialectError';
  }
}
