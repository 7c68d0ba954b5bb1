import { DOMParser } from '@xmldom/xmldom';
import { OK, Result } from './Result';

/**
 * Receiver of the tokenizer's events. A failed result halts tokenization;
 * no further events are delivered.
 */
export interface XmlEventHandler {
  onStartTag(name: string, attributes: ReadonlyArray<readonly [string, string]>): Result<void>;
  onEndTag(name: string): Result<void>;
  onCharacterData(text: string): Result<void>;
}

const ELEMENT_NODE = 1;
const TEXT_NODE = 3;
const CDATA_SECTION_NODE = 4;

// xmldom appends the locator position to its messages as "@<systemId>#[line:L,col:C]".
const LOCATOR_RE = /\s*@[^#\n]*#\[line:(\d+),col:(\d+)\]\s*$/;
const LEVEL_PREFIX_RE = /^\[xmldom \w+\]\s*/;

function isElement(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE;
}

function lineOf(node: Node): number | undefined {
  const value: unknown = Reflect.get(node, 'lineNumber');
  return typeof value === 'number' ? value : undefined;
}

/**
 * Event source over `@xmldom/xmldom`. Chunks are buffered as they are fed;
 * `run` parses the document and replays it to the handler as start-tag,
 * character-data and end-tag events in document order.
 */
export class XmlTokenizer {
  private chunks: Buffer[] = [];
  private stopped = false;
  private line = 0;
  private error: string | null = null;

  public feed(chunk: Buffer | string): void {
    this.chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk);
  }

  /** Halt tokenization; callable from inside an event callback. */
  public stop(): void {
    this.stopped = true;
  }

  public get isStopped(): boolean {
    return this.stopped;
  }

  /**
   * Line of the syntax error, or the start-tag line of the element being
   * reported. End-tag events also carry the start tag's line.
   */
  public get currentLine(): number {
    return this.line;
  }

  /** Description of the syntax error, if the document was malformed. */
  public get errorString(): string | null {
    return this.error;
  }

  public run(handler: XmlEventHandler): Result<void> {
    const xml = Buffer.concat(this.chunks).toString('utf8');
    this.chunks = [];
    const problems: string[] = [];
    let doc: Document | undefined;
    try {
      doc = new DOMParser({
        locator: {},
        errorHandler: {
          // xmldom closes unbalanced elements and reads unquoted values after a warning.
          warning: (msg: unknown) => { problems.push(String(msg)); },
          error: (msg: unknown) => { problems.push(String(msg)); },
          fatalError: (msg: unknown) => { problems.push(String(msg)); }
        }
      }).parseFromString(xml, 'application/xml');
    } catch (error) {
      problems.push(error instanceof Error ? error.message : String(error));
    }

    const root = doc ? doc.documentElement : null;
    if (problems.length > 0 || !root) {
      return this.syntaxError(problems.length > 0 ? problems[0] : 'no element found');
    }
    return this.visit(root, handler);
  }

  private syntaxError(message: string): Result<void> {
    const position = LOCATOR_RE.exec(message);
    this.line = position ? parseInt(position[1], 10) : 0;
    this.error = message.replace(LOCATOR_RE, '').replace(LEVEL_PREFIX_RE, '').trim();
    return { ok: false, error: { kind: 'syntax', message: this.error, line: this.line } };
  }

  private visit(node: Node, handler: XmlEventHandler): Result<void> {
    if (this.stopped) return OK;

    if (node.nodeType === TEXT_NODE || node.nodeType === CDATA_SECTION_NODE) {
      return this.deliver(handler.onCharacterData(node.nodeValue ?? ''));
    }
    if (!isElement(node)) return OK;

    this.line = lineOf(node) ?? this.line;
    const attributes: Array<[string, string]> = [];
    for (let i = 0; i < node.attributes.length; i++) {
      const attr = node.attributes.item(i);
      if (attr) attributes.push([attr.name, attr.value]);
    }
    const started = this.deliver(handler.onStartTag(node.tagName, attributes));
    if (!started.ok || this.stopped) return started;

    for (let i = 0; i < node.childNodes.length; i++) {
      const visited = this.visit(node.childNodes[i], handler);
      if (!visited.ok) return visited;
      if (this.stopped) return OK;
    }

    this.line = lineOf(node) ?? this.line;
    return this.deliver(handler.onEndTag(node.tagName));
  }

  private deliver(result: Result<void>): Result<void> {
    if (result.ok) return result;
    this.stopped = true;
    return { ok: false, error: { ...result.error, line: this.line } };
  }
}
