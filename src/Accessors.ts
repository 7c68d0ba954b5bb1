import { AstNode, ModelDescriptionNode, ScalarVariableNode } from './Ast';
import { ContractViolationError } from './Result';
import {
  AttributeSymbol,
  ENUM_DEFAULTS,
  ENUM_DOMAINS,
  EnumLiteral,
  att,
  lookupEnum
} from './Vocabulary';

/**
 * Outcome of reading an attribute:
 * - defined: present and readable as the requested type
 * - missing: absent (the value is a default, if the attribute has one)
 * - illegal: present but not readable as the requested type
 */
export type ValueStatus = 'defined' | 'missing' | 'illegal';

export interface AttributeValue<T> {
  value: T;
  status: ValueStatus;
}

/** Value reference marking a variable that has none. */
export const UNDEFINED_VALUE_REFERENCE = 0xFFFFFFFF;

const DOUBLE_PREFIX_RE = /^\s*[+-]?(?:inf(?:inity)?|nan|(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?)/i;
const INT_PREFIX_RE = /^\s*[+-]?\d+/;
const UINT_PREFIX_RE = /^\s*\+?\d+/;

const INT_MIN = -2147483648;
const INT_MAX = 2147483647;

/**
 * Raw attribute value. Names are compared by symbol identity.
 */
export function getString(node: AstNode, a: AttributeSymbol): string | undefined {
  for (const attribute of node.attributes) {
    if (attribute.name === a) return attribute.value;
  }
  return undefined;
}

/**
 * Read a floating-point number from the start of `value`. Leading blanks are
 * skipped and trailing text is ignored.
 */
export function parseDouble(value: string | undefined): AttributeValue<number> {
  if (value === undefined) return { value: 0, status: 'missing' };
  const match = DOUBLE_PREFIX_RE.exec(value);
  if (!match) return { value: 0, status: 'illegal' };
  const text = match[0].trim().toLowerCase();
  const negative = text.startsWith('-');
  const unsigned = text.replace(/^[+-]/, '');
  if (unsigned.startsWith('inf')) return { value: negative ? -Infinity : Infinity, status: 'defined' };
  if (unsigned === 'nan') return { value: NaN, status: 'defined' };
  return { value: parseFloat(text), status: 'defined' };
}

export function getDouble(node: AstNode, a: AttributeSymbol): AttributeValue<number> {
  return parseDouble(getString(node, a));
}

/**
 * Signed 32-bit integer. Also used for Enumeration values, which are
 * stored as integers.
 */
export function getInt(node: AstNode, a: AttributeSymbol): AttributeValue<number> {
  const value = getString(node, a);
  if (value === undefined) return { value: 0, status: 'missing' };
  const match = INT_PREFIX_RE.exec(value);
  if (!match) return { value: 0, status: 'illegal' };
  const n = parseInt(match[0], 10);
  if (n < INT_MIN || n > INT_MAX) return { value: 0, status: 'illegal' };
  return { value: n, status: 'defined' };
}

export function getUInt(node: AstNode, a: AttributeSymbol): AttributeValue<number> {
  const value = getString(node, a);
  if (value === undefined) return { value: UNDEFINED_VALUE_REFERENCE, status: 'missing' };
  const match = UINT_PREFIX_RE.exec(value);
  if (!match) return { value: UNDEFINED_VALUE_REFERENCE, status: 'illegal' };
  const n = parseInt(match[0], 10);
  if (n > UNDEFINED_VALUE_REFERENCE) return { value: UNDEFINED_VALUE_REFERENCE, status: 'illegal' };
  return { value: n, status: 'defined' };
}

export function getBoolean(node: AstNode, a: AttributeSymbol): AttributeValue<boolean> {
  const value = getString(node, a);
  if (value === undefined) return { value: false, status: 'missing' };
  if (value === 'true') return { value: true, status: 'defined' };
  if (value === 'false') return { value: false, status: 'defined' };
  return { value: false, status: 'illegal' };
}

/**
 * Value of a built-in enum attribute. A missing value yields the attribute's
 * default (if it has one) with status 'missing'.
 */
export function getEnumValue(node: AstNode, a: AttributeSymbol): AttributeValue<EnumLiteral | undefined> {
  const value = getString(node, a);
  if (value === undefined) return { value: ENUM_DEFAULTS.get(a), status: 'missing' };
  const literal = lookupEnum(value);
  const domain = ENUM_DOMAINS.get(a);
  if (!literal || (domain && !domain.includes(literal))) return { value: undefined, status: 'illegal' };
  return { value: literal, status: 'defined' };
}

// Convenience accessors for attributes the schema requires. They are only
// safe on a validated tree; absence is a broken contract, not a parse error.

export function getModelIdentifier(md: ModelDescriptionNode): string {
  const modelId = getString(md, att('modelIdentifier'));
  if (modelId === undefined) throw new ContractViolationError('fmiModelDescription has no modelIdentifier');
  return modelId;
}

export function getNumberOfStates(md: ModelDescriptionNode): number {
  const n = getUInt(md, att('numberOfContinuousStates'));
  if (n.status !== 'defined') {
    throw new ContractViolationError(`numberOfContinuousStates is ${n.status}`);
  }
  return n.value;
}

export function getNumberOfEventIndicators(md: ModelDescriptionNode): number {
  const n = getInt(md, att('numberOfEventIndicators'));
  if (n.status !== 'defined') {
    throw new ContractViolationError(`numberOfEventIndicators is ${n.status}`);
  }
  return n.value;
}

/** Required on ScalarVariable, Type, Item, Annotation and Tool. */
export function getName(node: AstNode): string {
  const name = getString(node, att('name'));
  if (name === undefined) throw new ContractViolationError(`${node.kind} has no name`);
  return name;
}

function enumWithDefault(node: AstNode, a: AttributeSymbol): EnumLiteral {
  const { value } = getEnumValue(node, a);
  // Illegal literals are rejected while parsing, so only a hand-built node gets here.
  if (value === undefined) throw new ContractViolationError(`${node.kind} has an illegal ${a.name}`);
  return value;
}

/** input, output, internal or none; internal when absent. */
export function getCausality(sv: ScalarVariableNode): EnumLiteral {
  return enumWithDefault(sv, att('causality'));
}

/** constant, parameter, discrete or continuous; continuous when absent. */
export function getVariability(sv: ScalarVariableNode): EnumLiteral {
  return enumWithDefault(sv, att('variability'));
}

/** noAlias, alias or negatedAlias; noAlias when absent. */
export function getAlias(sv: ScalarVariableNode): EnumLiteral {
  return enumWithDefault(sv, att('alias'));
}

export function getVariableNamingConvention(md: ModelDescriptionNode): EnumLiteral {
  return enumWithDefault(md, att('variableNamingConvention'));
}

/**
 * The value reference is unique only within one base type (Real,
 * Integer or Enumeration, Boolean, String) and may be
 * UNDEFINED_VALUE_REFERENCE.
 */
export function getValueReference(sv: ScalarVariableNode): number {
  const vr = getUInt(sv, att('valueReference'));
  if (vr.status !== 'defined') {
    throw new ContractViolationError(`valueReference of ${getString(sv, att('name')) ?? 'ScalarVariable'} is ${vr.status}`);
  }
  return vr.value;
}
