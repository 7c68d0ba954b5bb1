export * from './Vocabulary';
export * from './Ast';
export { NodeStack, StackUnderflowError } from './NodeStack';
export { CharacterData } from './CharacterData';
export { TreeBuilder } from './TreeBuilder';
export { XmlTokenizer } from './XmlTokenizer';
export type { XmlEventHandler } from './XmlTokenizer';
export * from './Accessors';
export * from './Lookup';
export { validate } from './Validator';
export { ModelDescription } from './ModelDescription';
export { ModelDescriptionParser, parse, parseString } from './ModelDescriptionParser';
export type { ParserOptions } from './ModelDescriptionParser';
export { formatElement, formatModelDescription } from './Printer';
export { ConsoleDiagnostics } from './Diagnostics';
export type { DiagnosticsSink, Severity } from './Diagnostics';
export { DEFAULT_CONFIG, loadConfig } from './Config';
export type { ParserConfig } from './Config';
export { ContractViolationError } from './Result';
export type { BuildError, BuildErrorKind, Result } from './Result';
export { ReductionProfiler } from './Profiler';
