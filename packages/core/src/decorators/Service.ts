import { inject, injectable } from 'inversify';
import type { ServiceIdentifier } from 'inversify';

export function Service() {
  return injectable();
}

export const Use = (id: ServiceIdentifier) => inject(id);
