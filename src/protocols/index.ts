/**
 * tbforge Protocols — Public API
 */

export { createRegistry, loadRegistry, defaultRegistry, BUNDLED_SIGNATURES_PATH } from './registry.js';
export type { SignatureRegistry, RegistryDocument } from './registry.js';
export { classifyPorts, resolveProtocol, scoreSignature, DEFAULT_SCORE_FLOOR, DEFAULT_ACCEPT_THRESHOLD } from './classify.js';
export type { ClassifyOptions, ResolveOptions } from './classify.js';
export { normalizePortName, aliasMatches, inferResetPolarity, roleFor, roleSatisfies, widthInRange } from './match.js';
