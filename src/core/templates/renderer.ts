/**
 * Placeholder substitution for `{{ identifier }}` markers.
 *
 * A placeholder whose name is missing from the context is left in the
 * output exactly as written.
 */
import type { RenderContext } from './types.js';

const PLACEHOLDER_SOURCE = String.raw`\{\{\s*([A-Za-z_][A-Za-z0-9_]*)\s*\}\}`;

function placeholderPattern(): RegExp {
  return new RegExp(PLACEHOLDER_SOURCE, 'g');
}

/**
 * Names of all placeholders in a template string, in order of first use.
 */
export function findPlaceholders(template: string): string[] {
  const names = new Set<string>();
  for (const match of template.matchAll(placeholderPattern())) {
    names.add(match[1]);
  }
  return [...names];
}

/**
 * Render a template string against a context.
 */
export function render(template: string, context: RenderContext): string {
  return template.replace(placeholderPattern(), (placeholder: string, name: string) =>
    Object.prototype.hasOwnProperty.call(context, name) ? context[name] : placeholder
  );
}
