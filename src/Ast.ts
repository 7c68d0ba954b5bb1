import { AstNodeType, AttributeSymbol, ElementKind, getAstNodeType } from './Vocabulary';

export interface Attribute {
  readonly name: AttributeSymbol;
  readonly value: string;
}

interface BaseNode {
  readonly id: number;
  readonly kind: ElementKind;
  readonly shape: AstNodeType;
  attributes: Attribute[];
}

export interface ElementNode extends BaseNode {
  readonly shape: 'element';
}

export interface ListElementNode extends BaseNode {
  readonly shape: 'list';
  list: AstNode[] | null;
}

export interface TypeNode extends BaseNode {
  readonly shape: 'type';
  typeSpec: AstNode | null;
}

export interface ScalarVariableNode extends BaseNode {
  readonly shape: 'scalarVariable';
  typeSpec: AstNode | null;
  directDependencies: AstNode[] | null;
}

export interface CoSimulationNode extends BaseNode {
  readonly shape: 'coSimulation';
  capabilities: AstNode | null;
  model: ListElementNode | null;
}

export interface ModelDescriptionNode extends BaseNode {
  readonly shape: 'modelDescription';
  unitDefinitions: ListElementNode[] | null;
  typeDefinitions: TypeNode[] | null;
  defaultExperiment: AstNode | null;
  vendorAnnotations: ListElementNode[] | null;
  modelVariables: ScalarVariableNode[] | null;
  coSimulation: CoSimulationNode | null;
}

export type AstNode =
  | ElementNode
  | ListElementNode
  | TypeNode
  | ScalarVariableNode
  | CoSimulationNode
  | ModelDescriptionNode;

export function isListNode(node: AstNode): node is ListElementNode {
  return node.shape === 'list';
}

export function isTypeNode(node: AstNode): node is TypeNode {
  return node.shape === 'type';
}

export function isScalarVariableNode(node: AstNode): node is ScalarVariableNode {
  return node.shape === 'scalarVariable';
}

export function isCoSimulationNode(node: AstNode): node is CoSimulationNode {
  return node.shape === 'coSimulation';
}

export function isModelDescriptionNode(node: AstNode): node is ModelDescriptionNode {
  return node.shape === 'modelDescription';
}

/**
 * Owner of node allocations. Tracks which nodes are live so that tests and
 * the CLI can check that every exit path releases what it allocated, once.
 */
export class NodeArena {
  private nextId = 1;
  private live = new Set<number>();
  private releases = 0;
  private invalid = 0;

  public get allocatedCount(): number {
    return this.nextId - 1;
  }

  public get releasedCount(): number {
    return this.releases;
  }

  public get liveCount(): number {
    return this.live.size;
  }

  /** Releases of a node that was already released or never allocated here. */
  public get invalidReleaseCount(): number {
    return this.invalid;
  }

  public isLive(node: AstNode): boolean {
    return this.live.has(node.id);
  }

  public allocate(): number {
    const id = this.nextId++;
    this.live.add(id);
    return id;
  }

  public release(node: AstNode): void {
    if (!this.live.delete(node.id)) {
      this.invalid++;
      return;
    }
    this.releases++;
  }
}

/**
 * Allocate a node of the shape dictated by its kind, with all child slots empty.
 */
export function createNode(arena: NodeArena, kind: ElementKind, attributes: Attribute[]): AstNode {
  const id = arena.allocate();
  const shape = getAstNodeType(kind);
  switch (shape) {
    case 'element':
      return { id, kind, shape, attributes };
    case 'list':
      return { id, kind, shape, attributes, list: null };
    case 'type':
      return { id, kind, shape, attributes, typeSpec: null };
    case 'scalarVariable':
      return { id, kind, shape, attributes, typeSpec: null, directDependencies: null };
    case 'coSimulation':
      return { id, kind, shape, attributes, capabilities: null, model: null };
    case 'modelDescription':
      return {
        id, kind, shape, attributes,
        unitDefinitions: null,
        typeDefinitions: null,
        defaultExperiment: null,
        vendorAnnotations: null,
        modelVariables: null,
        coSimulation: null
      };
  }
}

function freeList(list: readonly AstNode[] | null, arena: NodeArena): void {
  if (!list) return;
  for (const node of list) {
    freeElement(node, arena);
  }
}

/**
 * Deep release of a node and everything it owns.
 */
export function freeElement(node: AstNode | null, arena: NodeArena): void {
  if (!node) return;
  switch (node.shape) {
    case 'element':
      break;
    case 'list':
      freeList(node.list, arena);
      break;
    case 'scalarVariable':
      freeList(node.directDependencies, arena);
      freeElement(node.typeSpec, arena);
      break;
    case 'type':
      freeElement(node.typeSpec, arena);
      break;
    case 'coSimulation':
      freeElement(node.capabilities, arena);
      freeElement(node.model, arena);
      break;
    case 'modelDescription':
      freeList(node.unitDefinitions, arena);
      freeList(node.typeDefinitions, arena);
      freeElement(node.defaultExperiment, arena);
      freeList(node.vendorAnnotations, arena);
      freeList(node.modelVariables, arena);
      freeElement(node.coSimulation, arena);
      break;
  }
  arena.release(node);
}
