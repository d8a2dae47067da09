import * as cheerio from 'cheerio';
import {
  hasChildren,
  isCDATA,
  isComment,
  isDirective,
  isDocument,
  isTag,
  isText,
  type AnyNode
} from 'domhandler';

export type ArenaNodeKind = 'root' | 'element' | 'text' | 'comment' | 'directive' | 'cdata';

export interface ArenaNode {
  readonly index: number;
  readonly parent: number | null;
  readonly children: readonly number[];
  // Exclusive end of this node's subtree; indices are in document order
  readonly end: number;
  readonly kind: ArenaNodeKind;
  readonly tagName?: string;
}

interface MutableArenaNode {
  index: number;
  parent: number | null;
  children: number[];
  end: number;
  kind: ArenaNodeKind;
  tagName?: string;
}

export type HtmlParseMode = 'document' | 'fragment';

// Doctype, <html>, <head> or <body> up front (after whitespace and comments) means a full document
const DOCUMENT_PROLOGUE = /^\s*(?:<!--[\s\S]*?-->\s*)*<(?:!doctype|html|head|body)[\s>/]/i;

export function detectParseMode(source: string): HtmlParseMode {
  return DOCUMENT_PROLOGUE.test(source) ? 'document' : 'fragment';
}

function kindOf(node: AnyNode): ArenaNodeKind {
  if (isDocument(node)) return 'root';
  if (isTag(node)) return 'element';
  if (isText(node)) return 'text';
  if (isComment(node)) return 'comment';
  if (isCDATA(node)) return 'cdata';
  if (isDirective(node)) return 'directive';
  return 'root';
}

/**
 * Flat, index-addressed view over a parsed HTML tree.
 *
 * Parent/child relations are plain indices into `nodes`; all reads and writes
 * of text and attributes go through an index, so a rewrite only ever touches
 * one slot.
 */
export class HtmlArena {
  readonly nodes: readonly ArenaNode[];
  private readonly handles: readonly AnyNode[];

  private constructor(
    private readonly $: cheerio.CheerioAPI,
    readonly mode: HtmlParseMode,
    nodes: ArenaNode[],
    handles: AnyNode[]
  ) {
    this.nodes = nodes;
    this.handles = handles;
  }

  static parse(source: string, mode: HtmlParseMode = detectParseMode(source)): HtmlArena {
    const $ = cheerio.load(source, null, mode === 'document');
    const root = $.root()[0];
    if (!root) {
      throw new Error('HTML parser produced no root node');
    }

    const nodes: MutableArenaNode[] = [];
    const handles: AnyNode[] = [];

    // Iterative pre-order walk; deep documents must not exhaust the call stack
    const stack: Array<{ node: AnyNode; parent: number | null }> = [{ node: root, parent: null }];
    while (stack.length > 0) {
      const entry = stack.pop();
      if (!entry) break;

      const index = nodes.length;
      const { node, parent } = entry;
      nodes.push({
        index,
        parent,
        children: [],
        end: index + 1,
        kind: kindOf(node),
        tagName: isTag(node) ? node.name.toLowerCase() : undefined
      });
      handles.push(node);

      if (parent !== null) {
        nodes[parent]?.children.push(index);
      }

      if (hasChildren(node)) {
        for (let i = node.children.length - 1; i >= 0; i--) {
          const child = node.children[i];
          if (child) stack.push({ node: child, parent: index });
        }
      }
    }

    // Children always come after their parent, so one backwards pass settles subtree ends
    for (let i = nodes.length - 1; i >= 0; i--) {
      const node = nodes[i];
      if (!node) continue;
      const lastChild = node.children[node.children.length - 1];
      if (lastChild !== undefined) {
        node.end = nodes[lastChild]?.end ?? node.end;
      }
    }

    return new HtmlArena($, mode, nodes, handles);
  }

  get size(): number {
    return this.nodes.length;
  }

  node(index: number): ArenaNode {
    const node = this.nodes[index];
    if (!node) {
      throw new RangeError(`No arena node at index ${index}`);
    }
    return node;
  }

  text(index: number): string {
    const handle = this.handles[index];
    return handle && isText(handle) ? handle.data : '';
  }

  setText(index: number, value: string): void {
    const handle = this.handles[index];
    if (!handle || !isText(handle)) {
      throw new TypeError(`Arena node ${index} is not a text node`);
    }
    handle.data = value;
  }

  attribute(index: number, name: string): string | undefined {
    const handle = this.handles[index];
    return handle && isTag(handle) ? handle.attribs[name] : undefined;
  }

  setAttribute(index: number, name: string, value: string): void {
    const handle = this.handles[index];
    if (!handle || !isTag(handle) || !(name in handle.attribs)) {
      throw new TypeError(`Arena node ${index} has no attribute "${name}"`);
    }
    handle.attribs[name] = value;
  }

  tagSequence(): string[] {
    const tags: string[] = [];
    for (const node of this.nodes) {
      if (node.tagName !== undefined) tags.push(node.tagName);
    }
    return tags;
  }

  serialize(): string {
    return this.$.html();
  }
}
