/**
 * tbforge RTL — Public API
 */

export { tokenize, findClosing, joinTokens } from './lexer.js';
export type { Token, TokenKind } from './lexer.js';
export { parseLiteral, evaluate, clog2 } from './constants.js';
export { extractPorts, locateModules, collectParameters } from './extract-ports.js';
export type { ExtractPortsOptions, ModuleSpan } from './extract-ports.js';
export { recoverStateGraph, emptyStateGraph, DEFAULT_MAX_STATE_WIDTH } from './fsm.js';
export type { RecoverStateGraphOptions } from './fsm.js';
export { recoverRegisters } from './registers.js';
export { analyzeRtl, analyzeFile } from './analyze.js';
export type { AnalyzeOptions, RtlAnalysis } from './analyze.js';
export { analyzeProject } from './analyze-project.js';
export type { AnalyzeProjectOptions, ProjectAnalysis } from './analyze-project.js';
