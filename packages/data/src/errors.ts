export class ResourceNotFoundError extends Error {
  constructor(public path: string) {
    super(`Resource not found: ${path}`);
    this.name = 'ResourceNotFoundError';
  }
}
