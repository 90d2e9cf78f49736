import { Container as Di } from 'inversify';

/**
 * Create an isolated container. Each resolved extension gets its own, so the
 * collaborators bound for one descriptor never leak into another.
 */
export function createContainer(): Di {
  return new Di({ defaultScope: 'Singleton' });
}
