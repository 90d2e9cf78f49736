import type { DisplayEnvironment, Platform } from '../interfaces/DisplayEnvironment';

/** A fixed platform with a scale set the host can change at runtime. */
export class StaticDisplayEnvironment implements DisplayEnvironment {
  private scales: readonly number[];

  constructor(
    readonly platform: Platform = 'mac',
    scales: readonly number[] = [1, 2],
  ) {
    this.scales = normalizeScales(scales);
  }

  displayScales(): readonly number[] {
    return this.scales;
  }

  setDisplayScales(scales: readonly number[]): void {
    this.scales = normalizeScales(scales);
  }
}

function normalizeScales(scales: readonly number[]): readonly number[] {
  const valid = [...new Set(scales.filter((scale) => Number.isFinite(scale) && scale > 0))].sort((a, b) => a - b);
  return valid.length ? valid : [1];
}
