import { AstNode } from './Ast';

export class StackUnderflowError extends Error {
  constructor() {
    super('Pop from an empty node stack');
    this.name = 'StackUnderflowError';
  }
}

/**
 * LIFO of owned nodes used by the tree builder.
 *
 * Popped nodes are not dropped: they stay in a history until claimed, either
 * by `popLastAsArray`, by `claim`, or by being pushed back. List reductions
 * pop an unknown number of siblings one at a time and then take the whole run
 * back as one ordered array, and an aborted parse can still reach every node
 * through `drain`.
 */
export class NodeStack {
  private items: AstNode[] = [];
  private history: AstNode[] = [];

  public get size(): number {
    return this.items.length;
  }

  /** Number of popped nodes not yet claimed. */
  public get pending(): number {
    return this.history.length;
  }

  public isEmpty(): boolean {
    return this.items.length === 0;
  }

  public push(node: AstNode): void {
    const i = this.history.lastIndexOf(node);
    if (i >= 0) this.history.splice(i, 1);
    this.items.push(node);
  }

  public pop(): AstNode {
    const node = this.items.pop();
    if (!node) throw new StackUnderflowError();
    this.history.push(node);
    return node;
  }

  public peek(): AstNode | undefined {
    return this.items[this.items.length - 1];
  }

  /**
   * Take a popped node out of the history; the caller becomes its owner.
   * @returns false if the node was not waiting in the history
   */
  public claim(node: AstNode): boolean {
    const i = this.history.lastIndexOf(node);
    if (i < 0) return false;
    this.history.splice(i, 1);
    return true;
  }

  /**
   * The last `k` popped nodes in their original push order. The nodes leave
   * the history and belong to the caller.
   */
  public popLastAsArray(k: number): AstNode[] {
    if (k < 0 || k > this.history.length) {
      throw new RangeError(`Cannot take ${k} nodes from a history of ${this.history.length}`);
    }
    const run = this.history.splice(this.history.length - k, k);
    return run.reverse();
  }

  /**
   * Hand over every node still owned by the stack, live or popped, and empty it.
   */
  public drain(): AstNode[] {
    const all = [...this.items, ...this.history];
    this.items = [];
    this.history = [];
    return all;
  }
}
