export type TemplateValues = Record<string, string | number | undefined>;

/**
 * Substitute `{name}` placeholders. Unknown placeholders are left as they are so a typo
 * shows up in the prompt instead of silently vanishing.
 */
export function fillTemplate(template: string, values: TemplateValues): string {
  return template.replace(/\{(\w+)\}/g, (match, key: string) => {
    const value = values[key];
    return value === undefined ? match : String(value);
  });
}

/** Drop the common indentation of a template literal and trim blank edges. */
export function dedent(text: string): string {
  const lines = text.replace(/^\n+|\s+$/g, '').split('\n');
  const indents = lines.filter((line) => line.trim()).map((line) => line.match(/^ */)?.[0].length ?? 0);
  const common = indents.length > 0 ? Math.min(...indents) : 0;
  return lines.map((line) => line.slice(common)).join('\n');
}

const LIST_MARKER = /^(?:[-•*]|\d+[.)])\s*/;

/** Split a model reply into list items, keeping the lines that pass `keep`. */
export function parseList(text: string, keep: (line: string) => boolean = () => true): string[] {
  return text
    .split('\n')
    .map((line) => line.trim().replace(LIST_MARKER, '').trim())
    .filter((line) => line.length > 0 && keep(line));
}
