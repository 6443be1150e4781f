/**
 * OSM XML Fragment Scanner
 *
 * Cuts a character stream into the source text of top-level `node`, `way`
 * and `relation` elements so each can be parsed on its own. Only the
 * unfinished tail of the stream is buffered between chunks.
 *
 * Relies on two properties of OSM documents: those elements never nest in
 * each other, and `<` cannot appear unescaped inside attribute values. Open
 * tags are scanned quote-aware so a `>` inside a value does not end them.
 *
 * @module ingestion/fragment-scanner
 */

import { OsmParseError } from '../core/errors.js';
import type { ElementKind } from '../core/types.js';

export interface ElementFragment {
  readonly kind: ElementKind;
  readonly xml: string;
  /** Character offset of the fragment in the whole stream */
  readonly offset: number;
}

const ELEMENT_KINDS: ReadonlySet<string> = new Set<ElementKind>(['node', 'way', 'relation']);

const TAG_NAME = /^<([A-Za-z_][\w:.-]*)/;

function isElementKind(name: string): name is ElementKind {
  return ELEMENT_KINDS.has(name);
}

/**
 * Markup that must be skipped whole: comments, CDATA, declarations
 */
const SKIPPED_MARKUP: readonly { readonly open: string; readonly close: string }[] = [
  { open: '<!--', close: '-->' },
  { open: '<![CDATA[', close: ']]>' },
  { open: '<?', close: '?>' },
  { open: '<!', close: '>' },
];

export class ElementFragmentScanner {
  private buffer = '';
  /** Stream offset of buffer[0] */
  private bufferOffset = 0;

  /**
   * Add a chunk and return every element completed by it, in document order
   */
  push(chunk: string): ElementFragment[] {
    this.buffer += chunk;
    const fragments: ElementFragment[] = [];
    let pos = 0;

    for (;;) {
      const start = this.buffer.indexOf('<', pos);
      if (start === -1) {
        pos = this.buffer.length;
        break;
      }

      const step = this.scanMarkup(start);
      if (step === null) {
        // Incomplete markup: keep it for the next chunk
        pos = start;
        break;
      }
      if (step.fragment) {
        fragments.push(step.fragment);
      }
      pos = step.end;
    }

    this.buffer = this.buffer.slice(pos);
    this.bufferOffset += pos;
    return fragments;
  }

  /**
   * Signal end of input. Throws when the stream stopped inside an element.
   */
  end(): void {
    const start = this.buffer.indexOf('<');
    if (start === -1) {
      return;
    }
    const name = TAG_NAME.exec(this.buffer.slice(start))?.[1];
    if (name !== undefined && isElementKind(name)) {
      throw new OsmParseError(`Unexpected end of input inside <${name}>`, this.bufferOffset + start);
    }
    if (this.buffer.slice(start).trim().length > 0) {
      throw new OsmParseError('Unexpected end of input inside markup', this.bufferOffset + start);
    }
  }

  /**
   * Examine the markup at `start`. Returns null when more input is needed.
   */
  private scanMarkup(start: number): { end: number; fragment?: ElementFragment } | null {
    const rest = this.buffer.slice(start, start + 16);

    for (const markup of SKIPPED_MARKUP) {
      if (rest.startsWith(markup.open)) {
        const close = this.buffer.indexOf(markup.close, start + markup.open.length);
        return close === -1 ? null : { end: close + markup.close.length };
      }
      if (markup.open.startsWith(rest)) {
        // Chunk ended inside the opener itself
        return null;
      }
    }

    if (this.buffer.startsWith('</', start)) {
      const close = this.buffer.indexOf('>', start);
      return close === -1 ? null : { end: close + 1 };
    }

    const openEnd = this.findOpenTagEnd(start);
    if (openEnd === -1) {
      return null;
    }

    const name = TAG_NAME.exec(this.buffer.slice(start, openEnd + 1))?.[1];
    if (name === undefined) {
      throw new OsmParseError('Malformed tag', this.bufferOffset + start);
    }

    // Container (<osm>) or element outside our interest (<bounds>): skip the open tag only
    if (!isElementKind(name)) {
      return { end: openEnd + 1 };
    }

    const selfClosing = this.buffer[openEnd - 1] === '/';
    if (selfClosing) {
      return { end: openEnd + 1, fragment: this.fragment(name, start, openEnd + 1) };
    }

    const closing = new RegExp(`</${name}\\s*>`, 'g');
    closing.lastIndex = openEnd + 1;
    const match = closing.exec(this.buffer);
    if (match === null) {
      return null;
    }
    const end = match.index + match[0].length;
    return { end, fragment: this.fragment(name, start, end) };
  }

  /**
   * Index of the `>` closing the open tag at `start`, skipping quoted values
   */
  private findOpenTagEnd(start: number): number {
    let quote: string | null = null;
    for (let i = start + 1; i < this.buffer.length; i++) {
      const ch = this.buffer[i];
      if (quote !== null) {
        if (ch === quote) quote = null;
      } else if (ch === '"' || ch === "'") {
        quote = ch;
      } else if (ch === '>') {
        return i;
      } else if (ch === '<') {
        throw new OsmParseError('Unexpected "<" inside tag', this.bufferOffset + i);
      }
    }
    return -1;
  }

  private fragment(kind: ElementKind, start: number, end: number): ElementFragment {
    return {
      kind,
      xml: this.buffer.slice(start, end),
      offset: this.bufferOffset + start,
    };
  }
}
