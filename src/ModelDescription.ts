import {
  AttributeValue,
  getModelIdentifier,
  getNumberOfEventIndicators,
  getNumberOfStates,
  getVariableNamingConvention,
  parseDouble
} from './Accessors';
import { ModelDescriptionNode, NodeArena, ScalarVariableNode, TypeNode, freeElement } from './Ast';
import * as Lookup from './Lookup';
import { formatModelDescription } from './Printer';
import { AttributeName, ElementKind, EnumLiteral, att } from './Vocabulary';

/**
 * Handle to a parsed and validated model description. Owns the tree; call
 * `free()` exactly once when done.
 */
export class ModelDescription {
  private declaredTypeCache = new Map<string, TypeNode | undefined>();
  private released = false;

  constructor(
    private readonly tree: ModelDescriptionNode,
    public readonly arena: NodeArena
  ) {}

  public get root(): ModelDescriptionNode {
    if (this.released) throw new Error('Model description has already been released');
    return this.tree;
  }

  public get isReleased(): boolean {
    return this.released;
  }

  public get modelIdentifier(): string {
    return getModelIdentifier(this.root);
  }

  public get numberOfContinuousStates(): number {
    return getNumberOfStates(this.root);
  }

  public get numberOfEventIndicators(): number {
    return getNumberOfEventIndicators(this.root);
  }

  public get variableNamingConvention(): EnumLiteral {
    return getVariableNamingConvention(this.root);
  }

  public get variables(): readonly ScalarVariableNode[] {
    return this.root.modelVariables ?? [];
  }

  public getVariableByName(name: string): ScalarVariableNode | undefined {
    return Lookup.getVariableByName(this.root, name);
  }

  public getVariable(vr: number, type: ElementKind): ScalarVariableNode | undefined {
    return Lookup.getVariable(this.root, vr, type);
  }

  public getNonAliasVariable(vr: number, type: ElementKind): ScalarVariableNode | undefined {
    return Lookup.getNonAliasVariable(this.root, vr, type);
  }

  /**
   * Declared type by name. Lookups are cached per handle.
   */
  public getDeclaredType(name: string | undefined): TypeNode | undefined {
    if (name === undefined) return undefined;
    if (this.declaredTypeCache.has(name)) {
      return this.declaredTypeCache.get(name);
    }
    const type = Lookup.getDeclaredType(this.root, name);
    this.declaredTypeCache.set(name, type);
    return type;
  }

  /**
   * Attribute of a variable's type-spec, or of its declared type's type-spec
   * when not set locally.
   */
  public getVariableAttribute(sv: ScalarVariableNode, name: AttributeName): string | undefined {
    if (!sv.typeSpec) return undefined;
    return Lookup.getInheritedString(this.root, sv.typeSpec, att(name), typeName => this.getDeclaredType(typeName));
  }

  public getVariableAttributeDouble(sv: ScalarVariableNode, name: AttributeName): AttributeValue<number> {
    return parseDouble(this.getVariableAttribute(sv, name));
  }

  public getDescription(sv: ScalarVariableNode): string | undefined {
    return Lookup.getDescription(this.root, sv);
  }

  public getVariableAttributeString(vr: number, type: ElementKind, name: AttributeName): string | undefined {
    return Lookup.getVariableAttributeString(this.root, vr, type, att(name));
  }

  public getNominal(vr: number): number {
    return Lookup.getNominal(this.root, vr);
  }

  public format(): string {
    return formatModelDescription(this.root).join('\n');
  }

  /**
   * Release the whole tree. A handle can be released only once.
   */
  public free(): void {
    if (this.released) throw new Error('Model description has already been released');
    freeElement(this.tree, this.arena);
    this.declaredTypeCache.clear();
    this.released = true;
  }
}
