import {
  AstNode,
  Attribute,
  ListElementNode,
  ModelDescriptionNode,
  NodeArena,
  createNode,
  freeElement,
  isCoSimulationNode,
  isListNode,
  isModelDescriptionNode,
  isScalarVariableNode,
  isTypeNode
} from './Ast';
import { CharacterData } from './CharacterData';
import { NodeStack } from './NodeStack';
import { ReductionProfiler } from './Profiler';
import { OK, Result, fail, ok } from './Result';
import {
  COSIMULATION_KINDS,
  ENUM_DOMAINS,
  ElementKind,
  LIST_CHILD_KIND,
  TYPE_SPEC_KINDS,
  VARIABLE_TYPE_KINDS,
  att,
  lookupAttribute,
  lookupElement,
  lookupEnum
} from './Vocabulary';
import { XmlEventHandler } from './XmlTokenizer';

/**
 * Folds the children of a just-closed element into its node. Returns the kind
 * that must be on top of the stack afterwards.
 */
type ReductionRule = (kind: ElementKind) => Result<ElementKind>;

type RootSlot = 'coSimulation' | 'modelVariables' | 'vendorAnnotations' | 'defaultExperiment' | 'typeDefinitions' | 'unitDefinitions';

const ROOT_SLOTS: ReadonlyMap<ElementKind, RootSlot> = new Map<ElementKind, RootSlot>([
  ['CoSimulation_StandAlone', 'coSimulation'],
  ['CoSimulation_Tool', 'coSimulation'],
  ['ModelVariables', 'modelVariables'],
  ['VendorAnnotations', 'vendorAnnotations'],
  ['DefaultExperiment', 'defaultExperiment'],
  ['TypeDefinitions', 'typeDefinitions'],
  ['UnitDefinitions', 'unitDefinitions']
]);

function typeError<T>(expected: string, found: ElementKind): Result<T> {
  return fail('type-mismatch', `Wrong element type, expected ${expected}, found ${found}`);
}

function narrowAll<T extends AstNode>(nodes: readonly AstNode[], guard: (node: AstNode) => node is T): T[] | undefined {
  const out: T[] = [];
  for (const node of nodes) {
    if (!guard(node)) return undefined;
    out.push(node);
  }
  return out;
}

/**
 * Grammar of the model description, expressed as one reduction rule per
 * element kind. Start tags push a node; end tags run the element's rule,
 * which pops the children it expects and attaches them.
 *
 * One instance serves one parse. On failure the driver calls `abort`, which
 * releases every node the builder still owns.
 */
export class TreeBuilder implements XmlEventHandler {
  private readonly stack = new NodeStack();
  private readonly text = new CharacterData();
  private readonly rules: Partial<Record<ElementKind, ReductionRule>> = {};
  // Node created by each start tag not yet closed, innermost last.
  private open: AstNode[] = [];

  constructor(
    private readonly arena: NodeArena,
    private readonly profiler?: ReductionProfiler
  ) {
    for (const container of LIST_CHILD_KIND.keys()) {
      this.rules[container] = (kind) => this.reduceList(kind);
    }
    this.rules.fmiModelDescription = () => this.reduceModelDescription();
    this.rules.Implementation = () => this.reduceImplementation();
    this.rules.CoSimulation_StandAlone = (kind) => this.reduceCoSimulation(kind);
    this.rules.CoSimulation_Tool = (kind) => this.reduceCoSimulation(kind);
    this.rules.Type = () => this.reduceType();
    this.rules.ScalarVariable = () => this.reduceScalarVariable();
    this.rules.Name = () => this.reduceName();
  }

  public onStartTag(name: string, attributes: ReadonlyArray<readonly [string, string]>): Result<void> {
    const kind = lookupElement(name);
    if (!kind) return fail('unknown-element', `Illegal element ${name}`);
    const canonical = this.canonicalizeAttributes(attributes);
    if (!canonical.ok) return canonical;
    if (kind === 'Name') {
      this.text.start();
    } else {
      this.text.stop();
    }
    const node = createNode(this.arena, kind, canonical.value);
    this.stack.push(node);
    this.open.push(node);
    return OK;
  }

  public onCharacterData(text: string): Result<void> {
    this.text.append(text);
    return OK;
  }

  public onEndTag(name: string): Result<void> {
    const kind = lookupElement(name);
    if (!kind) return fail('unknown-element', `Illegal element ${name}`);
    const opened = this.open.pop();
    const t0 = this.profiler ? this.profiler.start() : 0;
    try {
      const rule = this.rules[kind];
      const reduced = rule ? rule(kind) : ok(kind);
      if (!reduced.ok) return reduced;
      if (this.stack.pending !== 0) {
        return fail('internal', `Reduction of ${kind} left ${this.stack.pending} unclaimed node(s)`);
      }
      // All children are off the stack; the element itself must be on top.
      const top = this.expectPeek(reduced.value);
      if (!top.ok) return top;
      // A child of the same kind left on top would pass the kind check.
      if (reduced.value === kind && top.value !== opened) {
        return fail('type-mismatch', `Element ${kind} cannot contain ${top.value.kind}`);
      }
      return OK;
    } finally {
      if (this.profiler) this.profiler.end(kind, t0);
    }
  }

  /**
   * The finished tree. The stack must hold exactly the root.
   */
  public finish(): Result<ModelDescriptionNode> {
    const top = this.stack.peek();
    if (!top || this.stack.size !== 1) {
      return fail('structure', `Illegal document structure, ${this.stack.size} element(s) left open`);
    }
    if (!isModelDescriptionNode(top)) return typeError('fmiModelDescription', top.kind);
    this.stack.pop();
    this.stack.claim(top);
    return ok(top);
  }

  /**
   * Release every node still owned by the builder, on the stack or popped
   * and not yet attached.
   */
  public abort(): void {
    for (const node of this.stack.drain()) {
      freeElement(node, this.arena);
    }
    this.text.reset();
    this.open = [];
  }

  private canonicalizeAttributes(attributes: ReadonlyArray<readonly [string, string]>): Result<Attribute[]> {
    const out: Attribute[] = [];
    for (const [name, value] of attributes) {
      const symbol = lookupAttribute(name);
      if (!symbol) return fail('unknown-attribute', `Illegal attribute ${name}`);
      const domain = ENUM_DOMAINS.get(symbol);
      if (domain) {
        const literal = lookupEnum(value);
        if (!literal || !domain.includes(literal)) {
          return fail('illegal-enum', `Illegal enum value ${value} for attribute ${name}`);
        }
      }
      out.push({ name: symbol, value });
    }
    return ok(out);
  }

  private expectPeek(kind?: ElementKind): Result<AstNode> {
    const top = this.stack.peek();
    if (!top) {
      return fail('structure', `Illegal document structure, expected ${kind ?? 'xml element'}`);
    }
    if (kind && top.kind !== kind) return typeError(kind, top.kind);
    return ok(top);
  }

  private expectPop(kind?: ElementKind): Result<AstNode> {
    const top = this.expectPeek(kind);
    if (top.ok) this.stack.pop();
    return top;
  }

  private reduceList(container: ElementKind): Result<ElementKind> {
    const childKind = LIST_CHILD_KIND.get(container);
    let n = 0;
    for (let top = this.stack.peek(); top && top.kind === childKind; top = this.stack.peek()) {
      this.stack.pop();
      n++;
    }
    const list = this.expectPeek(container);
    if (!list.ok) return list;
    if (!isListNode(list.value)) return fail('internal', `${container} is not a list element`);
    list.value.list = this.stack.popLastAsArray(n);
    return ok(container);
  }

  private reduceModelDescription(): Result<ElementKind> {
    const blocks = new Map<RootSlot, AstNode>();
    for (;;) {
      const popped = this.expectPop();
      if (!popped.ok) return popped;
      const node = popped.value;
      if (isModelDescriptionNode(node)) {
        const attached = this.attachRootBlocks(node, blocks);
        this.stack.push(node);
        return attached.ok ? ok(node.kind) : attached;
      }
      const slot = ROOT_SLOTS.get(node.kind);
      if (!slot) return typeError('fmiModelDescription', node.kind);
      const previous = blocks.get(slot);
      if (previous) {
        return fail('duplicate-block', `Duplicate ${slot} block in fmiModelDescription: ${node.kind} and ${previous.kind}`);
      }
      blocks.set(slot, node);
    }
  }

  private attachRootBlocks(md: ModelDescriptionNode, blocks: ReadonlyMap<RootSlot, AstNode>): Result<void> {
    const coSimulation = blocks.get('coSimulation') ?? null;
    if (coSimulation && !isCoSimulationNode(coSimulation)) {
      return fail('internal', `${coSimulation.kind} is not a co-simulation block`);
    }
    const modelVariables = this.listItems(blocks.get('modelVariables'), isScalarVariableNode);
    const vendorAnnotations = this.listItems(blocks.get('vendorAnnotations'), isListNode);
    const typeDefinitions = this.listItems(blocks.get('typeDefinitions'), isTypeNode);
    const unitDefinitions = this.listItems(blocks.get('unitDefinitions'), isListNode);
    if (!modelVariables.ok) return modelVariables;
    if (!vendorAnnotations.ok) return vendorAnnotations;
    if (!typeDefinitions.ok) return typeDefinitions;
    if (!unitDefinitions.ok) return unitDefinitions;

    for (const block of blocks.values()) {
      this.stack.claim(block);
    }
    md.coSimulation = coSimulation;
    md.defaultExperiment = blocks.get('defaultExperiment') ?? null;
    md.modelVariables = modelVariables.value;
    md.vendorAnnotations = vendorAnnotations.value;
    md.typeDefinitions = typeDefinitions.value;
    md.unitDefinitions = unitDefinitions.value;
    // The list wrappers exist only in the document; their items now belong to the root.
    for (const slot of ['modelVariables', 'vendorAnnotations', 'typeDefinitions', 'unitDefinitions'] as const) {
      const container = blocks.get(slot);
      if (container && isListNode(container)) {
        container.list = null;
        freeElement(container, this.arena);
      }
    }
    return OK;
  }

  private listItems<T extends AstNode>(container: AstNode | undefined, guard: (node: AstNode) => node is T): Result<T[] | null> {
    if (!container) return ok(null);
    if (!isListNode(container)) return fail('internal', `${container.kind} is not a list element`);
    const items = narrowAll(container.list ?? [], guard);
    if (!items) return fail('internal', `Unexpected item in ${container.kind}`);
    return ok(items);
  }

  private reduceImplementation(): Result<ElementKind> {
    const cs = this.expectPop();
    if (!cs.ok) return cs;
    if (!COSIMULATION_KINDS.includes(cs.value.kind)) {
      return typeError('CoSimulation_StandAlone or CoSimulation_Tool', cs.value.kind);
    }
    const im = this.expectPop('Implementation');
    if (!im.ok) return im;
    this.stack.claim(im.value);
    freeElement(im.value, this.arena);
    this.stack.push(cs.value);
    return ok(cs.value.kind);
  }

  private reduceCoSimulation(kind: ElementKind): Result<ElementKind> {
    let model: ListElementNode | null = null;
    if (kind === 'CoSimulation_Tool') {
      const mo = this.expectPop('Model');
      if (!mo.ok) return mo;
      if (!isListNode(mo.value)) return fail('internal', 'Model is not a list element');
      model = mo.value;
    }
    const ca = this.expectPop('Capabilities');
    if (!ca.ok) return ca;
    const cs = this.expectPeek(kind);
    if (!cs.ok) return cs;
    const block = cs.value;
    if (!isCoSimulationNode(block)) return fail('internal', `${kind} is not a co-simulation block`);
    this.stack.claim(ca.value);
    block.capabilities = ca.value;
    if (model) {
      this.stack.claim(model);
      block.model = model;
    }
    return ok(kind);
  }

  private reduceType(): Result<ElementKind> {
    const ts = this.expectPop();
    if (!ts.ok) return ts;
    const tp = this.expectPeek('Type');
    if (!tp.ok) return tp;
    const type = tp.value;
    if (!isTypeNode(type)) return fail('internal', 'Type is not a type node');
    if (!TYPE_SPEC_KINDS.includes(ts.value.kind)) return typeError('RealType or similar', ts.value.kind);
    this.stack.claim(ts.value);
    type.typeSpec = ts.value;
    return ok('Type');
  }

  private reduceScalarVariable(): Result<ElementKind> {
    let child = this.expectPop();
    if (!child.ok) return child;
    let dependencies: ListElementNode | null = null;
    if (child.value.kind === 'DirectDependency') {
      if (!isListNode(child.value)) return fail('internal', 'DirectDependency is not a list element');
      dependencies = child.value;
      child = this.expectPop();
      if (!child.ok) return child;
    }
    const sv = this.expectPeek('ScalarVariable');
    if (!sv.ok) return sv;
    const variable = sv.value;
    if (!isScalarVariableNode(variable)) return fail('internal', 'ScalarVariable is not a variable node');
    if (!VARIABLE_TYPE_KINDS.includes(child.value.kind)) return typeError('Real or similar', child.value.kind);

    this.stack.claim(child.value);
    variable.typeSpec = child.value;
    if (dependencies) {
      this.stack.claim(dependencies);
      variable.directDependencies = dependencies.list ?? [];
      dependencies.list = null;
      freeElement(dependencies, this.arena);
    }
    return ok('ScalarVariable');
  }

  private reduceName(): Result<ElementKind> {
    // The one element whose value is content, not attributes.
    const name = this.expectPop('Name');
    if (!name.ok) return name;
    name.value.attributes = [{ name: att('input'), value: this.text.take() }];
    this.text.stop();
    this.stack.push(name.value);
    return ok('Name');
  }
}
