export type Platform = 'mac' | 'ios' | 'visionos' | 'windows' | 'linux' | 'chromeos';

export const PLATFORMS: readonly Platform[] = ['mac', 'ios', 'visionos', 'windows', 'linux', 'chromeos'];

/**
 * Where the extension is being resolved for. The platform drives
 * `suggested_key` lookup and background persistence rules; the scales drive
 * icon selection.
 */
export interface DisplayEnvironment {
  readonly platform: Platform;
  /** Active display scale factors, e.g. `[1, 2]` */
  displayScales(): readonly number[];
}

export function isPlatform(value: string): value is Platform {
  return PLATFORMS.some((platform) => platform === value);
}
