import { AttributeValue, UNDEFINED_VALUE_REFERENCE, getAlias, getName, getString, getValueReference, parseDouble } from './Accessors';
import { AstNode, ModelDescriptionNode, ScalarVariableNode, TypeNode } from './Ast';
import { AttributeSymbol, ElementKind, att } from './Vocabulary';

/**
 * Enumeration and Integer share a base type; Real, Boolean and String each
 * form their own.
 */
export function sameBaseType(t1: ElementKind, t2: ElementKind): boolean {
  return t1 === t2 ||
    (t1 === 'Enumeration' && t2 === 'Integer') ||
    (t2 === 'Enumeration' && t1 === 'Integer');
}

/** Variable names are unique within a model. */
export function getVariableByName(md: ModelDescriptionNode, name: string): ScalarVariableNode | undefined {
  return md.modelVariables?.find(sv => getName(sv) === name);
}

/**
 * First variable with the given value reference and base type. Value
 * reference and type do not form a unique key, so this may be an alias.
 */
export function getVariable(md: ModelDescriptionNode, vr: number, type: ElementKind): ScalarVariableNode | undefined {
  if (vr === UNDEFINED_VALUE_REFERENCE) return undefined;
  return md.modelVariables?.find(sv =>
    sv.typeSpec !== null && sameBaseType(type, sv.typeSpec.kind) && getValueReference(sv) === vr
  );
}

/**
 * Like `getVariable`, but skips aliases.
 */
export function getNonAliasVariable(md: ModelDescriptionNode, vr: number, type: ElementKind): ScalarVariableNode | undefined {
  if (vr === UNDEFINED_VALUE_REFERENCE) return undefined;
  return md.modelVariables?.find(sv =>
    sv.typeSpec !== null && sameBaseType(type, sv.typeSpec.kind) && getValueReference(sv) === vr && getAlias(sv) === 'noAlias'
  );
}

export function getDeclaredType(md: ModelDescriptionNode, declaredType: string | undefined): TypeNode | undefined {
  if (declaredType === undefined) return undefined;
  return md.typeDefinitions?.find(tp => getString(tp, att('name')) === declaredType);
}

/**
 * Attribute of a type-spec, falling back to the type-spec of its declared
 * type. The chain is exactly two levels: local, then declared type.
 */
export function getInheritedString(
  md: ModelDescriptionNode,
  typeSpec: AstNode,
  a: AttributeSymbol,
  findType: (name: string | undefined) => TypeNode | undefined = name => getDeclaredType(md, name)
): string | undefined {
  const value = getString(typeSpec, a);
  if (value !== undefined) return value;
  const type = findType(getString(typeSpec, att('declaredType')));
  return type && type.typeSpec ? getString(type.typeSpec, a) : undefined;
}

/**
 * Description of a variable, or else of its declared type.
 */
export function getDescription(md: ModelDescriptionNode, sv: ScalarVariableNode): string | undefined {
  const value = getString(sv, att('description'));
  if (value !== undefined) return value;
  if (!sv.typeSpec) return undefined;
  const type = getDeclaredType(md, getString(sv.typeSpec, att('declaredType')));
  return type ? getString(type, att('description')) : undefined;
}

/**
 * Attribute of the variable given by value reference and type, including
 * the default provided by its declared type.
 */
export function getVariableAttributeString(md: ModelDescriptionNode, vr: number, type: ElementKind, a: AttributeSymbol): string | undefined {
  const sv = getVariable(md, vr, type);
  if (!sv || !sv.typeSpec) return undefined;
  return getInheritedString(md, sv.typeSpec, a);
}

export function getVariableAttributeDouble(md: ModelDescriptionNode, vr: number, type: ElementKind, a: AttributeSymbol): AttributeValue<number> {
  return parseDouble(getVariableAttributeString(md, vr, type, a));
}

/**
 * Nominal value of a Real variable or its declared type; 1 when undefined.
 */
export function getNominal(md: ModelDescriptionNode, vr: number): number {
  const nominal = getVariableAttributeDouble(md, vr, 'Real', att('nominal'));
  return nominal.status === 'defined' ? nominal.value : 1.0;
}
