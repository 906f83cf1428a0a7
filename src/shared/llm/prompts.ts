/**
 * LLM Prompts
 *
 * Common prompt utilities shared by the pipeline components.
 */

/**
 * A labelled block of prompt content
 */
export interface PromptSection {
  label: string;
  body: string;
}

/**
 * Join labelled sections into one prompt body.
 * Empty sections are dropped; labels are upper-cased.
 */
export function buildPromptSections(sections: PromptSection[]): string {
  return sections
    .filter(section => section.body.trim().length > 0)
    .map(section => `${section.label.toUpperCase()}:\n${section.body.trim()}`)
    .join('\n\n');
}

/**
 * Truncate text to a maximum length while preserving word boundaries
 */
export function truncateText(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }

  const truncated = text.substring(0, maxLength);
  const lastSpace = truncated.lastIndexOf(' ');

  if (lastSpace > 0) {
    return truncated.substring(0, lastSpace) + '...';
  }

  return truncated + '...';
}

/**
 * Format a list of items for inclusion in a prompt
 */
export function formatList(items: string[], numbered: boolean = false): string {
  if (numbered) {
    return items.map((item, i) => `${i + 1}. ${item}`).join('\n');
  }
  return items.map(item => `- ${item}`).join('\n');
}
