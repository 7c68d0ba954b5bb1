/**
 * Closed vocabulary of the FMI 1.0 model description: element names,
 * attribute names and enum literals. Every comparison of input text against
 * a known name happens in this module.
 */

export const ELEMENT_NAMES = [
  'fmiModelDescription', 'UnitDefinitions', 'BaseUnit', 'DisplayUnitDefinition', 'TypeDefinitions',
  'Type', 'RealType', 'IntegerType', 'BooleanType', 'StringType', 'EnumerationType', 'Item',
  'DefaultExperiment', 'VendorAnnotations', 'Tool', 'Annotation', 'ModelVariables', 'ScalarVariable',
  'DirectDependency', 'Name', 'Real', 'Integer', 'Boolean', 'String', 'Enumeration',
  'Implementation', 'CoSimulation_StandAlone', 'CoSimulation_Tool', 'Model', 'File', 'Capabilities'
] as const;

export const ATTRIBUTE_NAMES = [
  'fmiVersion', 'displayUnit', 'gain', 'offset', 'unit', 'name', 'description', 'quantity', 'relativeQuantity',
  'min', 'max', 'nominal', 'declaredType', 'start', 'fixed', 'startTime', 'stopTime', 'tolerance', 'value',
  'valueReference', 'variability', 'causality', 'alias', 'modelName', 'modelIdentifier', 'guid', 'author',
  'version', 'generationTool', 'generationDateAndTime', 'variableNamingConvention', 'numberOfContinuousStates',
  'numberOfEventIndicators', 'input',
  'canHandleVariableCommunicationStepSize', 'canHandleEvents', 'canRejectSteps', 'canInterpolateInputs',
  'maxOutputDerivativeOrder', 'canRunAsynchronuously', 'canSignalEvents', 'canBeInstantiatedOnlyOncePerProcess',
  'canNotUseMemoryManagementFunctions', 'file', 'entryPoint', 'manualStart', 'type'
] as const;

export const ENUM_LITERALS = [
  'flat', 'structured', 'constant', 'parameter', 'discrete', 'continuous',
  'input', 'output', 'internal', 'none', 'noAlias', 'alias', 'negatedAlias'
] as const;

export type ElementKind = typeof ELEMENT_NAMES[number];
export type AttributeName = typeof ATTRIBUTE_NAMES[number];
export type EnumLiteral = typeof ENUM_LITERALS[number];

/**
 * Interned attribute name. Exactly one instance exists per name, so two
 * attributes denote the same name iff their symbols are identical.
 */
export interface AttributeSymbol {
  readonly index: number;
  readonly name: AttributeName;
}

const attributeSymbols: readonly AttributeSymbol[] = Object.freeze(
  ATTRIBUTE_NAMES.map((name, index) => Object.freeze({ index, name }))
);

const elementIndex = new Map<string, number>(ELEMENT_NAMES.map((name, i) => [name, i]));
const attributeIndex = new Map<string, number>(ATTRIBUTE_NAMES.map((name, i) => [name, i]));
const enumIndex = new Map<string, number>(ENUM_LITERALS.map((name, i) => [name, i]));

/** Returned by the index lookups when a name is not in the table. */
export const NOT_FOUND = -1;

export function elementIndexOf(name: string): number {
  return elementIndex.get(name) ?? NOT_FOUND;
}

export function attributeIndexOf(name: string): number {
  return attributeIndex.get(name) ?? NOT_FOUND;
}

export function enumIndexOf(name: string): number {
  return enumIndex.get(name) ?? NOT_FOUND;
}

export function lookupElement(name: string): ElementKind | undefined {
  const i = elementIndexOf(name);
  return i === NOT_FOUND ? undefined : ELEMENT_NAMES[i];
}

export function lookupAttribute(name: string): AttributeSymbol | undefined {
  const i = attributeIndexOf(name);
  return i === NOT_FOUND ? undefined : attributeSymbols[i];
}

export function lookupEnum(name: string): EnumLiteral | undefined {
  const i = enumIndexOf(name);
  return i === NOT_FOUND ? undefined : ENUM_LITERALS[i];
}

/**
 * The canonical symbol for a known attribute name. Used by code that names
 * attributes statically, e.g. `att('causality')`.
 */
export function att(name: AttributeName): AttributeSymbol {
  return attributeSymbols[attributeIndexOf(name)];
}

/** Legal literals of each enum-typed attribute. */
export const ENUM_DOMAINS: ReadonlyMap<AttributeSymbol, readonly EnumLiteral[]> = new Map<AttributeSymbol, readonly EnumLiteral[]>([
  [att('variableNamingConvention'), ['flat', 'structured']],
  [att('variability'), ['constant', 'parameter', 'discrete', 'continuous']],
  [att('causality'), ['input', 'output', 'internal', 'none']],
  [att('alias'), ['noAlias', 'alias', 'negatedAlias']]
]);

/** Value used by the enum accessor when the attribute is absent. */
export const ENUM_DEFAULTS: ReadonlyMap<AttributeSymbol, EnumLiteral> = new Map<AttributeSymbol, EnumLiteral>([
  [att('variableNamingConvention'), 'flat'],
  [att('variability'), 'continuous'],
  [att('causality'), 'internal'],
  [att('alias'), 'noAlias']
]);

export type AstNodeType = 'element' | 'list' | 'type' | 'scalarVariable' | 'coSimulation' | 'modelDescription';

/**
 * Shape of the node built for an element kind.
 */
export function getAstNodeType(kind: ElementKind): AstNodeType {
  switch (kind) {
    case 'fmiModelDescription':
      return 'modelDescription';
    case 'Type':
      return 'type';
    case 'ScalarVariable':
      return 'scalarVariable';
    case 'CoSimulation_StandAlone':
    case 'CoSimulation_Tool':
      return 'coSimulation';
    case 'BaseUnit':
    case 'EnumerationType':
    case 'Tool':
    case 'UnitDefinitions':
    case 'TypeDefinitions':
    case 'VendorAnnotations':
    case 'ModelVariables':
    case 'DirectDependency':
    case 'Model':
      return 'list';
    default:
      return 'element';
  }
}

/** Child kind of every list-shaped element. */
export const LIST_CHILD_KIND: ReadonlyMap<ElementKind, ElementKind> = new Map<ElementKind, ElementKind>([
  ['UnitDefinitions', 'BaseUnit'],
  ['BaseUnit', 'DisplayUnitDefinition'],
  ['TypeDefinitions', 'Type'],
  ['EnumerationType', 'Item'],
  ['VendorAnnotations', 'Tool'],
  ['Tool', 'Annotation'],
  ['ModelVariables', 'ScalarVariable'],
  ['DirectDependency', 'Name'],
  ['Model', 'File']
]);

export const TYPE_SPEC_KINDS: readonly ElementKind[] = ['RealType', 'IntegerType', 'BooleanType', 'StringType', 'EnumerationType'];
export const VARIABLE_TYPE_KINDS: readonly ElementKind[] = ['Real', 'Integer', 'Boolean', 'String', 'Enumeration'];
export const COSIMULATION_KINDS: readonly ElementKind[] = ['CoSimulation_StandAlone', 'CoSimulation_Tool'];
