export class CircularResolutionException extends Error {
  constructor(field: string) {
    super(`Field "${field}" was read while it was still being resolved`);
    this.name = 'CircularResolutionException';
    Object.setPrototypeOf(this, CircularResolutionException.prototype);
  }
}
