/**
 * Resume Parser
 *
 * Deterministic LaTeX scanner. Finds bullets (\item, \resumeItem{...} and
 * plain "- " lines), ties each one to its \section and sub-heading, and keeps
 * character spans so edits can be written back into the original markup.
 *
 * Only the document body is scanned: macro definitions in the preamble
 * (\newcommand{\resumeItem}[1]{\item ...}) never produce bullets.
 */

import type { BulletStyle, ResumeBullet } from '../types';

const MIN_BULLET_LENGTH = 10;
const DEFAULT_SECTION = 'General';

const MARKER = /\\(section|subsection)\*?\s*\{|\\(resumeSubheading|resumeProjectHeading)\s*\{|\\resumeItem\s*\{|\\item(?![a-zA-Z])|\\begin\s*\{([^}]*)\}|\\end\s*\{([^}]*)\}/g;
const ITEM_END = /\\item(?![a-zA-Z])|\\end\s*\{|\\begin\s*\{|\\(?:sub)?section\*?\s*\{|\\resume[A-Z][A-Za-z]*/g;
const DASH_LINE = /^([ \t]*)([-\u2022])([ \t]+)(.*\S)[ \t]*$/gm;

const ESCAPES: Array<[string, string]> = [
  ['\\&', '&'],
  ['\\%', '%'],
  ['\\$', '$'],
  ['\\#', '#'],
  ['\\_', '_'],
  ['\\{', '{'],
  ['\\}', '}']
];

/**
 * Replace comments with spaces, keeping every offset intact
 */
export function maskComments(content: string): string {
  return content
    .split('\n')
    .map(line => {
      for (let i = 0; i < line.length; i++) {
        if (line[i] === '\\') {
          i++; // skip the escaped character
          continue;
        }
        if (line[i] === '%') {
          return line.slice(0, i) + ' '.repeat(line.length - i);
        }
      }
      return line;
    })
    .join('\n');
}

/**
 * Plain text of a LaTeX fragment: commands dropped, their arguments kept
 */
export function cleanLatex(text: string): string {
  let result = text;

  // escaped specials become placeholders so brace stripping leaves them alone
  ESCAPES.forEach(([escaped], index) => {
    result = result.split(escaped).join(String.fromCharCode(0xe000 + index));
  });

  result = result
    .replace(/\\\\(\[[^\]]*\])?/g, ' ')
    .replace(/\\[vh]space\*?\s*\{[^}]*\}/g, ' ')
    .replace(/\\href\s*\{[^}]*\}/g, '')
    .replace(/\\[a-zA-Z]+\*?(\[[^\]]*\])?/g, ' ')
    .replace(/[{}$]/g, '')
    .replace(/~/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();

  ESCAPES.forEach(([, plain], index) => {
    result = result.split(String.fromCharCode(0xe000 + index)).join(plain);
  });

  return result.replace(/\s+([,.;:])/g, '$1');
}

/**
 * Inner range of the brace group opening at `openIndex`, or null when unbalanced
 */
function readGroup(text: string, openIndex: number): { start: number; end: number } | null {
  let depth = 0;
  for (let i = openIndex; i < text.length; i++) {
    const char = text[i];
    if (char === '\\') {
      i++;
    } else if (char === '{') {
      depth++;
    } else if (char === '}') {
      depth--;
      if (depth === 0) {
        return { start: openIndex + 1, end: i };
      }
    }
  }
  return null;
}

function trimRange(text: string, start: number, end: number): { start: number; end: number } {
  let from = start;
  let to = end;
  while (from < to && /\s/.test(text[from])) from++;
  while (to > from && /\s/.test(text[to - 1])) to--;
  return { start: from, end: to };
}

interface Heading {
  position: number;
  title: string;
}

interface LocatedBullet {
  style: BulletStyle;
  span: { start: number; end: number };
  markup: { start: number; end: number };
}

/**
 * Where a bullet's markup sits, used by the editor
 */
export interface BulletLocation {
  bullet: ResumeBullet;
  markup: { start: number; end: number };
}

function lastBefore(headings: Heading[], position: number, after = -1): Heading | undefined {
  let found: Heading | undefined;
  for (const heading of headings) {
    if (heading.position >= position) break;
    if (heading.position > after) found = heading;
  }
  return found;
}

function scan(masked: string): { bullets: LocatedBullet[]; sections: Heading[]; subsections: Heading[] } {
  const bodyStart = masked.search(/\\begin\s*\{document\}/);
  const regionStart = bodyStart === -1 ? 0 : bodyStart;
  const bodyEnd = masked.search(/\\end\s*\{document\}/);
  const regionEnd = bodyEnd === -1 ? masked.length : bodyEnd;

  const bullets: LocatedBullet[] = [];
  const sections: Heading[] = [];
  const subsections: Heading[] = [];
  const environments: Array<{ name: string; position: number }> = [];
  const environmentRanges: Array<{ start: number; end: number }> = [];

  const marker = new RegExp(MARKER.source, 'g');
  marker.lastIndex = regionStart;
  let match: RegExpExecArray | null;

  while ((match = marker.exec(masked)) !== null && match.index < regionEnd) {
    const token = match[0];
    const openIndex = match.index + token.length - 1;

    if (match[1]) {
      const group = readGroup(masked, openIndex);
      if (!group) continue;
      const heading = { position: match.index, title: cleanLatex(masked.slice(group.start, group.end)) };
      (match[1] === 'section' ? sections : subsections).push(heading);
      marker.lastIndex = group.end + 1;
    } else if (match[2]) {
      const group = readGroup(masked, openIndex);
      if (!group) continue;
      subsections.push({ position: match.index, title: cleanLatex(masked.slice(group.start, group.end)) });
      marker.lastIndex = group.end + 1;
    } else if (token.startsWith('\\resumeItem')) {
      const group = readGroup(masked, openIndex);
      if (!group) continue;
      bullets.push({
        style: 'resumeItem',
        span: trimRange(masked, group.start, group.end),
        markup: { start: match.index, end: group.end + 1 }
      });
      marker.lastIndex = group.end + 1;
    } else if (token === '\\item') {
      let start = match.index + token.length;
      const label = /^\s*\[[^\]]*\]/.exec(masked.slice(start));
      if (label) start += label[0].length;

      const terminator = new RegExp(ITEM_END.source, 'g');
      terminator.lastIndex = start;
      const next = terminator.exec(masked);
      const end = next && next.index < regionEnd ? next.index : regionEnd;

      const span = trimRange(masked, start, end);
      bullets.push({ style: 'item', span, markup: { start: match.index, end: span.end } });
      marker.lastIndex = end;
    } else if (match[3] !== undefined) {
      environments.push({ name: match[3].trim(), position: match.index });
    } else if (match[4] !== undefined) {
      const name = match[4].trim();
      for (let i = environments.length - 1; i >= 0; i--) {
        if (environments[i].name === name) {
          const [opened] = environments.splice(i, 1);
          if (name !== 'document') {
            environmentRanges.push({ start: opened.position, end: match.index });
          }
          break;
        }
      }
    }
  }
  // unterminated environments run to the end of the body
  for (const open of environments) {
    if (open.name !== 'document') environmentRanges.push({ start: open.position, end: regionEnd });
  }

  const inside = (position: number, ranges: Array<{ start: number; end: number }>) =>
    ranges.some(range => position >= range.start && position < range.end);
  const markupRanges = bullets.map(bullet => bullet.markup);

  const dash = new RegExp(DASH_LINE.source, 'gm');
  while ((match = dash.exec(masked)) !== null) {
    if (match.index < regionStart) continue;
    if (match.index >= regionEnd) break;
    const markerStart = match.index + match[1].length;
    if (inside(markerStart, environmentRanges) || inside(markerStart, markupRanges)) continue;

    const start = markerStart + match[2].length + match[3].length;
    const end = start + match[4].length;
    bullets.push({ style: 'dash', span: { start, end }, markup: { start: markerStart, end } });
  }

  bullets.sort((a, b) => a.span.start - b.span.start);
  return { bullets, sections, subsections };
}

/**
 * Parse a LaTeX resume. A document without bullets yields an empty list.
 */
export function parseResume(content: string, fileName = 'resume.tex'): ResumeDocument {
  const masked = maskComments(content);
  const { bullets, sections, subsections } = scan(masked);

  const locations: BulletLocation[] = [];
  for (const located of bullets) {
    const text = cleanLatex(masked.slice(located.span.start, located.span.end));
    if (text.length <= MIN_BULLET_LENGTH) continue;

    const section = lastBefore(sections, located.markup.start);
    const subsection = lastBefore(subsections, located.markup.start, section?.position ?? -1);

    locations.push({
      bullet: {
        id: `b${locations.length + 1}`,
        text,
        rawText: content.slice(located.span.start, located.span.end),
        section: section?.title || DEFAULT_SECTION,
        subsection: subsection?.title || undefined,
        style: located.style,
        span: located.span
      },
      markup: located.markup
    });
  }

  return new ResumeDocument(fileName, content, locations);
}

interface Edit {
  start: number;
  end: number;
  text: string;
  sequence: number;
}

/**
 * A parsed resume plus pending edits. The source content is never mutated;
 * render() produces the edited document.
 */
export class ResumeDocument {
  private readonly byId = new Map<string, BulletLocation>();
  private readonly edits: Edit[] = [];
  private readonly edited = new Set<string>();

  constructor(
    readonly fileName: string,
    readonly content: string,
    locations: BulletLocation[]
  ) {
    for (const location of locations) {
      this.byId.set(location.bullet.id, location);
    }
  }

  get bullets(): ResumeBullet[] {
    return [...this.byId.values()].map(location => location.bullet);
  }

  getBullet(id: string): ResumeBullet | undefined {
    return this.byId.get(id)?.bullet;
  }

  /**
   * Replace the bullet's text; `latex` must already be escaped
   */
  replaceBullet(id: string, latex: string): void {
    const location = this.claim(id);
    this.push(location.bullet.span.start, location.bullet.span.end, latex);
  }

  /**
   * Insert a new bullet after `id`, in the same markup style and indentation
   */
  insertAfter(id: string, latex: string): void {
    const location = this.locate(id);
    const indent = this.indentAt(location.markup.start);

    switch (location.bullet.style) {
      case 'item':
        this.push(location.markup.end, location.markup.end, `\n${indent}\\item ${latex}`);
        break;
      case 'resumeItem':
        this.push(location.markup.end, location.markup.end, `\n${indent}\\resumeItem{${latex}}`);
        break;
      case 'dash':
        this.push(location.markup.end, location.markup.end, `\n${indent}- ${latex}`);
        break;
    }
  }

  /**
   * Turn the bullet's markup into LaTeX comment lines
   */
  commentOut(id: string): void {
    const location = this.claim(id);
    const { start, end } = location.markup;
    const indent = this.indentAt(start);

    const lineStart = this.content.lastIndexOf('\n', start - 1) + 1;
    const lineEnd = this.content.indexOf('\n', end);
    const before = this.content.slice(lineStart, start);
    const after = this.content.slice(end, lineEnd === -1 ? this.content.length : lineEnd);

    const commented = this.content
      .slice(start, end)
      .split('\n')
      .map(line => `% ${line}`)
      .join('\n');

    const prefix = before.trim() === '' ? '' : `\n${indent}`;
    const suffix = after.trim() === '' ? '' : `\n${indent}`;
    this.push(start, end, `${prefix}${commented}${suffix}`);
  }

  /**
   * The document with every edit applied, last position first
   */
  render(): string {
    const ordered = [...this.edits].sort((a, b) => b.start - a.start || b.sequence - a.sequence);
    let output = this.content;
    for (const edit of ordered) {
      output = output.slice(0, edit.start) + edit.text + output.slice(edit.end);
    }
    return output;
  }

  get editCount(): number {
    return this.edits.length;
  }

  private locate(id: string): BulletLocation {
    const location = this.byId.get(id);
    if (!location) {
      throw new Error(`Unknown bullet id: ${id}`);
    }
    return location;
  }

  private claim(id: string): BulletLocation {
    const location = this.locate(id);
    if (this.edited.has(id)) {
      throw new Error(`Bullet ${id} has already been edited`);
    }
    this.edited.add(id);
    return location;
  }

  private indentAt(position: number): string {
    const lineStart = this.content.lastIndexOf('\n', position - 1) + 1;
    const match = /^[ \t]*/.exec(this.content.slice(lineStart, position));
    return match ? match[0] : '';
  }

  private push(start: number, end: number, text: string): void {
    this.edits.push({ start, end, text, sequence: this.edits.length });
  }
}
