/**
 * tbforge — Core type definitions
 * Ports, protocol signatures, classification results, state graphs and the
 * verification-spec IR shared by every stage of the pipeline.
 */

// ─── Results ─────────────────────────────────────────────────────────

export type Result<T, E> =
  | { ok: true; value: T }
  | { ok: false; error: E };

// ─── Ports ───────────────────────────────────────────────────────────

export type PortDirection = 'input' | 'output' | 'inout';

export interface PortDeclaration {
  name: string;
  direction: PortDirection;
  width: number;
  msb?: number;
  lsb?: number;
  /** Raw packed-range text as written, e.g. "[DATA_WIDTH-1:0]" */
  range?: string;
  /** Width expression could not be evaluated; width defaulted to 1 */
  lowConfidence: boolean;
  line: number;
}

export interface RtlParameter {
  name: string;
  kind: 'parameter' | 'localparam';
  expression: string;
  value?: number;
  line: number;
}

export interface RtlDiagnostic {
  level: 'error' | 'warning';
  message: string;
  file: string;
  line: number;
}

export interface PortExtraction {
  module: string;
  ports: PortDeclaration[];
  parameters: RtlParameter[];
  diagnostics: RtlDiagnostic[];
}

// ─── Protocols & signatures ──────────────────────────────────────────

export type Protocol = 'apb' | 'axi4-lite' | 'uart' | 'spi' | 'i2c';

export const PROTOCOLS: readonly Protocol[] = ['apb', 'axi4-lite', 'uart', 'spi', 'i2c'];

export type SignalRole =
  | 'clock'
  | 'reset-active-low' | 'reset-active-high'
  | 'select' | 'enable'
  | 'ready' | 'valid'
  | 'write-enable'
  | 'address' | 'data' | 'strobe'
  | 'response';

export interface WidthRange {
  min: number;
  max?: number;
}

export interface RolePattern {
  /** Role-instance id, unique within a signature (e.g. "wdata") */
  name: string;
  role: SignalRole;
  /** Prioritized aliases; suffix match unless prefixed with "=" (exact) */
  aliases: string[];
  width: WidthRange;
  /** Port name substituted when a text-derived spec omits this role */
  default: string;
  /** Resets only: derive active-low/active-high from the bound port's name */
  polarity?: 'infer';
}

export interface BusBound {
  min: number;
  max: number;
  default: number;
}

export type ParameterSpec =
  | { kind: 'integer'; min?: number; max?: number; allowed?: number[]; default: number; aliases?: string[] }
  | { kind: 'number'; min?: number; max?: number; allowed?: number[]; default: number; aliases?: string[] }
  | { kind: 'boolean'; default: boolean; aliases?: string[] }
  | { kind: 'enum'; allowed: string[]; default: string; aliases?: string[] };

export interface ProtocolSignature {
  id: string;
  protocol: Protocol;
  label: string;
  minScore: number;
  /** byte: granularity = dataWidth / 8; index: granularity = 1 */
  addressing: 'byte' | 'index';
  bus: {
    dataWidth: BusBound;
    addressWidth: BusBound;
  };
  required: RolePattern[];
  optional: RolePattern[];
  features: string[];
  parameters: Record<string, ParameterSpec>;
}

// ─── Classification ──────────────────────────────────────────────────

export interface RoleBinding {
  role: SignalRole;
  port: PortDeclaration;
  widthMatched: boolean;
}

export interface ClassificationResult {
  protocol: Protocol;
  signature: string;
  confidence: number;
  bindings: Record<string, RoleBinding>;
  unmatchedRequired: string[];
  unmatchedOptional: string[];
}

// ─── State graphs ────────────────────────────────────────────────────

export interface StateNode {
  name: string;
  encoding: number;
  /** 'unknown' when no outgoing transition was observed; not proof of a terminal state */
  exits: 'observed' | 'unknown';
}

export interface StateEdge {
  from: string;
  to: string;
  guard?: string;
  line: number;
}

export interface StateGraph {
  variable?: string;
  nodes: StateNode[];
  edges: StateEdge[];
  initial?: string;
  initialSource?: 'reset' | 'first-observed';
  encoding?: 'binary' | 'one-hot';
}

// ─── Verification spec (IR) ──────────────────────────────────────────

export type AccessMode =
  | 'read-only'
  | 'write-only'
  | 'read-write'
  | 'write-1-to-clear'
  | 'write-1-to-set';

export interface RegisterField {
  name: string;
  offset: number;
  width: number;
  access: AccessMode;
  defaultValue: number;
}

export interface Register {
  name: string;
  address: number;
  access: AccessMode;
  /** Defaults to the bus data width */
  width?: number;
  resetValue?: number;
  description?: string;
  fields: RegisterField[];
}

export type ParameterValue = number | string | boolean;

export interface BusParameters {
  dataWidth: number;
  addressWidth: number;
  parameters: Record<string, ParameterValue>;
}

export interface RoleAssignment {
  role: SignalRole;
  port: string;
  width?: number;
  source: 'rtl' | 'declared' | 'default';
}

export type SpecOrigin = 'rtl' | 'text';

export interface VerificationSpec {
  protocol: Protocol;
  /** Signature variant id; the registry default for the protocol when absent */
  signature?: string;
  origin: SpecOrigin;
  moduleName: string;
  bus: BusParameters;
  registers: Register[];
  roles: Record<string, RoleAssignment>;
  stateGraph?: StateGraph;
  features: string[];
}

// ─── Errors ──────────────────────────────────────────────────────────

export interface ParseFailure {
  kind: 'ParseFailure';
  message: string;
  file: string;
  line?: number;
}

export interface NearMiss {
  signature: string;
  protocol: Protocol;
  unmatchedRequired: string[];
}

export interface AmbiguousProtocol {
  kind: 'AmbiguousProtocol';
  message: string;
  acceptThreshold: number;
  candidates: ClassificationResult[];
  nearMisses: NearMiss[];
}

export interface DuplicateAddressViolation {
  kind: 'DuplicateAddress';
  message: string;
  address: number;
  registers: string[];
}

export interface DuplicateNameViolation {
  kind: 'DuplicateName';
  message: string;
  name: string;
  register?: string;
}

export interface FieldOverflowViolation {
  kind: 'FieldOverflow';
  message: string;
  register: string;
  field: string;
  offset: number;
  width: number;
  registerWidth: number;
}

export interface FieldOverlapViolation {
  kind: 'FieldOverlap';
  message: string;
  register: string;
  fields: [string, string];
  /** Inclusive overlapping bit span [low, high] */
  bits: [number, number];
}

export interface MissingRoleViolation {
  kind: 'MissingRole';
  message: string;
  signature: string;
  role: string;
  expected: SignalRole;
}

export interface RoleConflictViolation {
  kind: 'RoleConflict';
  message: string;
  port: string;
  roles: string[];
}

export interface UnsupportedFeatureViolation {
  kind: 'UnsupportedFeature';
  message: string;
  signature: string;
  feature: string;
}

export interface OutOfRangeViolation {
  kind: 'OutOfRange';
  message: string;
  path: string;
  value: ParameterValue | null;
  expected: string;
}

export type SpecViolation =
  | DuplicateAddressViolation
  | DuplicateNameViolation
  | FieldOverflowViolation
  | FieldOverlapViolation
  | MissingRoleViolation
  | RoleConflictViolation
  | UnsupportedFeatureViolation
  | OutOfRangeViolation;

export interface ValidationWarning {
  code: 'role-defaulted' | 'unknown-role';
  message: string;
}

export type ValidationResult =
  | { ok: true; spec: VerificationSpec; warnings: ValidationWarning[] }
  | { ok: false; violations: SpecViolation[]; warnings: ValidationWarning[] };

export interface IncompleteSpec {
  kind: 'IncompleteSpec';
  message: string;
  artifact?: string;
  missing: string[];
  context: Record<string, unknown>;
}

export type ErrorKind =
  | ParseFailure['kind']
  | AmbiguousProtocol['kind']
  | SpecViolation['kind']
  | IncompleteSpec['kind'];

// ─── Generation plan ─────────────────────────────────────────────────

export type ArtifactKind =
  | 'interface' | 'package' | 'transaction' | 'config'
  | 'sequencer' | 'driver' | 'monitor' | 'agent'
  | 'register-model' | 'sequence-library' | 'scoreboard' | 'coverage' | 'assertions'
  | 'environment' | 'test' | 'top' | 'makefile';

/** The slice of the spec one artifact consumes */
export interface ArtifactIr {
  protocol?: Protocol;
  signature?: string;
  bus?: BusParameters;
  registers?: Register[];
  roles?: Record<string, RoleAssignment>;
  stateGraph?: StateGraph;
  features?: string[];
}

export interface ArtifactRequest {
  name: string;
  kind: ArtifactKind;
  file: string;
  /** Names of the artifacts this one references, all earlier in the plan */
  dependsOn: string[];
  /** Resolved name of every artifact in the plan */
  names: Partial<Record<ArtifactKind, string>>;
  /** Signature parameter defaults overlaid with the spec's values */
  parameters: Record<string, ParameterValue>;
  ir: ArtifactIr;
}

export interface GenerationPlan {
  moduleName: string;
  protocol: Protocol;
  /** Resolved signature variant */
  signature: string;
  origin: SpecOrigin;
  features: string[];
  requests: ArtifactRequest[];
}
