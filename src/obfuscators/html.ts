import { ObfuscationError, err, ok, type ExcerptConfig, type Result } from '../types/index.js';
import type { FillerGenerator } from './filler.js';
import { HtmlArena } from './html-arena.js';

// Executable, styling and embedded content keep their bodies byte for byte
const IGNORED_TAGS: ReadonlySet<string> = new Set(['script', 'noscript', 'style', 'template', 'iframe']);

export interface HtmlObfuscationOptions {
  filler: FillerGenerator;
  ignoreIds?: readonly string[];
  metaTags?: readonly string[];
  preserveTitle?: boolean;
  excerpt?: ExcerptConfig;
}

const utf8 = new TextDecoder('utf-8', { fatal: true });

function decodeMarkup(bytes: Uint8Array): Result<string, ObfuscationError> {
  let source: string;
  try {
    source = utf8.decode(bytes);
  } catch (error) {
    return err(new ObfuscationError('PARSE_FAILED', 'Body is not valid UTF-8', { cause: error }));
  }

  if (source.includes('\u0000')) {
    return err(new ObfuscationError('PARSE_FAILED', 'Body contains NUL bytes; not markup'));
  }

  return ok(source);
}

function obfuscateMetaTags(arena: HtmlArena, index: number, options: HtmlObfuscationOptions): void {
  const metaTags = options.metaTags ?? [];
  if (metaTags.length === 0) return;

  const content = arena.attribute(index, 'content');
  if (content === undefined) return;

  const keys = [arena.attribute(index, 'name'), arena.attribute(index, 'property')];
  if (!keys.some(key => key !== undefined && metaTags.includes(key))) return;

  arena.setAttribute(index, 'content', options.filler.text(content));
}

// Keeps the first `budget` non-whitespace characters and fills the rest
function fillPastBudget(filler: FillerGenerator, text: string, budget: number): { text: string; kept: number } {
  let output = '';
  let kept = 0;
  for (const char of text) {
    if (kept < budget && !/\s/u.test(char)) {
      output += char;
      kept++;
    } else {
      output += filler.text(char);
    }
  }
  return { text: output, kept };
}

function rewriteArena(arena: HtmlArena, options: HtmlObfuscationOptions): number {
  const ignoreIds = new Set(options.ignoreIds ?? []);
  let titleSeen = !options.preserveTitle;
  let rewritten = 0;

  // The anchor, its later siblings and their subtrees share one budget
  const excerpt = options.excerpt;
  let excerptEnd = -1;
  let excerptBudget = excerpt?.length ?? 0;

  let index = 0;
  while (index < arena.size) {
    const node = arena.node(index);

    if (node.kind === 'element' && node.tagName !== undefined) {
      const id = arena.attribute(index, 'id');
      if (id !== undefined && ignoreIds.has(id)) {
        index = node.end;
        continue;
      }

      if (excerpt !== undefined && excerptEnd < 0 && id === excerpt.anchorId) {
        excerptEnd = node.parent === null ? arena.size : arena.node(node.parent).end;
      }

      if (IGNORED_TAGS.has(node.tagName)) {
        index = node.end;
        continue;
      }

      if (node.tagName === 'title' && !titleSeen) {
        titleSeen = true;
        index = node.end;
        continue;
      }

      if (node.tagName === 'meta') {
        obfuscateMetaTags(arena, index, options);
      }
    }

    if (node.kind === 'text') {
      const original = arena.text(index);
      let replacement: string;
      if (index < excerptEnd && excerptBudget > 0) {
        const filled = fillPastBudget(options.filler, original, excerptBudget);
        excerptBudget -= filled.kept;
        replacement = filled.text;
      } else {
        replacement = options.filler.text(original);
      }
      if (replacement !== original) {
        arena.setText(index, replacement);
        rewritten++;
      }
    }

    index++;
  }

  return rewritten;
}

function sameSequence(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((tag, i) => tag === b[i]);
}

/**
 * Replaces the text content of an HTML document with filler while keeping its
 * tag tree. The output is re-parsed and compared with the input before it is
 * returned.
 */
export function obfuscateHtml(bytes: Uint8Array, options: HtmlObfuscationOptions): Result<Buffer, ObfuscationError> {
  const decoded = decodeMarkup(bytes);
  if (!decoded.ok) return decoded;

  let arena: HtmlArena;
  try {
    arena = HtmlArena.parse(decoded.value);
  } catch (error) {
    return err(new ObfuscationError('PARSE_FAILED', 'Failed to parse HTML', { cause: error }));
  }

  const expectedSize = arena.size;
  const expectedTags = arena.tagSequence();

  rewriteArena(arena, options);
  const output = arena.serialize();

  let reparsed: HtmlArena;
  try {
    reparsed = HtmlArena.parse(output, arena.mode);
  } catch (error) {
    return err(new ObfuscationError('SHAPE_MISMATCH', 'Obfuscated HTML failed to re-parse', { cause: error }));
  }

  if (reparsed.size !== expectedSize || !sameSequence(reparsed.tagSequence(), expectedTags)) {
    return err(
      new ObfuscationError(
        'SHAPE_MISMATCH',
        `Obfuscated HTML re-parses to ${reparsed.size} nodes, expected ${expectedSize}`
      )
    );
  }

  return ok(Buffer.from(output, 'utf-8'));
}
