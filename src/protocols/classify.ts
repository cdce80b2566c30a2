/**
 * tbforge — Protocol classification.
 *
 * Scores a port list against every registered signature and binds role
 * instances to ports. Matching is protocol-agnostic: everything protocol
 * specific lives in the registry data.
 */

import type {
  AmbiguousProtocol, ClassificationResult, NearMiss, PortDeclaration, ProtocolSignature,
  Result, RoleBinding,
} from '../types/index.js';
import type { SignatureRegistry } from './registry.js';
import { findPort, roleFor, widthInRange } from './match.js';

export const DEFAULT_SCORE_FLOOR = 0.5;
export const DEFAULT_ACCEPT_THRESHOLD = 0.8;

const REQUIRED_WEIGHT = 0.7;
const OPTIONAL_WEIGHT = 0.3;
const WIDTH_MISMATCH_CREDIT = 0.5;

export interface ClassifyOptions {
  /** Candidates must score strictly above this */
  floor?: number;
}

export interface ResolveOptions extends ClassifyOptions {
  /** The best candidate is accepted only when it scores strictly above this */
  acceptThreshold?: number;
}

function round4(x: number): number {
  return Math.round(x * 10000) / 10000;
}

/** Bind and score one signature; never filtered */
export function scoreSignature(ports: readonly PortDeclaration[], signature: ProtocolSignature): ClassificationResult {
  const taken = new Set<string>();
  const bindings: Record<string, RoleBinding> = {};

  const bindAll = (patterns: ProtocolSignature['required']) => {
    let credit = 0;
    const unmatched: string[] = [];
    for (const pattern of patterns) {
      const port = findPort(pattern, ports, taken);
      if (!port) {
        unmatched.push(pattern.name);
        continue;
      }
      taken.add(port.name);
      const widthMatched = widthInRange(port.width, pattern.width);
      bindings[pattern.name] = { role: roleFor(pattern, port.name), port, widthMatched };
      credit += widthMatched ? 1 : WIDTH_MISMATCH_CREDIT;
    }
    return { credit, unmatched };
  };

  const required = bindAll(signature.required);
  const optional = bindAll(signature.optional);

  let confidence = 0;
  if (required.unmatched.length === 0) {
    const optionalTerm = signature.optional.length === 0
      ? OPTIONAL_WEIGHT
      : (optional.credit / signature.optional.length) * OPTIONAL_WEIGHT;
    confidence = round4((required.credit / signature.required.length) * REQUIRED_WEIGHT + optionalTerm);
  }

  return {
    protocol: signature.protocol,
    signature: signature.id,
    confidence,
    bindings,
    unmatchedRequired: required.unmatched,
    unmatchedOptional: optional.unmatched,
  };
}

/**
 * Every signature scoring strictly above the floor (and at least its own
 * minimum), best first; equal scores keep registry order.
 */
export function classifyPorts(
  ports: readonly PortDeclaration[],
  registry: SignatureRegistry,
  options: ClassifyOptions = {},
): ClassificationResult[] {
  const floor = options.floor ?? DEFAULT_SCORE_FLOOR;
  return registry.signatures
    .map((sig, index) => ({ result: scoreSignature(ports, sig), minScore: sig.minScore, index }))
    .filter(c => c.result.confidence > floor && c.result.confidence >= c.minScore)
    .sort((a, b) => b.result.confidence - a.result.confidence || a.index - b.index)
    .map(c => c.result);
}

/**
 * Signatures that bound at least half their required roles, fewest missing
 * first, ties in registry order.
 */
function nearMisses(ports: readonly PortDeclaration[], registry: SignatureRegistry): NearMiss[] {
  return registry.signatures
    .map((sig, index) => ({ sig, index, result: scoreSignature(ports, sig) }))
    .filter(c => c.result.unmatchedRequired.length > 0
      && c.result.unmatchedRequired.length * 2 <= c.sig.required.length)
    .sort((a, b) => a.result.unmatchedRequired.length - b.result.unmatchedRequired.length || a.index - b.index)
    .map(c => ({ signature: c.sig.id, protocol: c.sig.protocol, unmatchedRequired: c.result.unmatchedRequired }));
}

/** The single accepted classification, or the evidence for why there is none */
export function resolveProtocol(
  ports: readonly PortDeclaration[],
  registry: SignatureRegistry,
  options: ResolveOptions = {},
): Result<ClassificationResult, AmbiguousProtocol> {
  const acceptThreshold = options.acceptThreshold ?? DEFAULT_ACCEPT_THRESHOLD;
  const candidates = classifyPorts(ports, registry, options);
  const [best] = candidates;
  if (best && best.confidence > acceptThreshold) return { ok: true, value: best };

  const misses = nearMisses(ports, registry);
  const message = best
    ? `Best match ${best.signature} scored ${best.confidence}, not above ${acceptThreshold}`
    : misses.length > 0
      ? `No protocol matched; closest is ${misses[0].signature} (missing ${misses[0].unmatchedRequired.join(', ')})`
      : 'No protocol matched the port list';
  return {
    ok: false,
    error: { kind: 'AmbiguousProtocol', message, acceptThreshold, candidates, nearMisses: misses },
  };
}
