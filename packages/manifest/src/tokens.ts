/** Container tokens for the collaborators a descriptor is built from. */
export const ResourceProviderToken = Symbol.for('ResourceProvider');
export const MatchPatternEngineToken = Symbol.for('MatchPatternEngine');
export const LocalizerToken = Symbol.for('Localizer');
export const ImageProviderToken = Symbol.for('ImageProvider');
export const WildcardMatcherToken = Symbol.for('WildcardMatcher');
export const DisplayEnvironmentToken = Symbol.for('DisplayEnvironment');
export const LoggerToken = Symbol.for('Logger');
