/**
 * Static discovery of the placeholders a template's files use.
 * Directory and command templates are not scanned.
 */
import { logger } from '../../utils/logger.js';
import { getErrorMessage } from '../../utils/errors.js';
import { resolveFileContent } from './content.js';
import { findPlaceholders } from './renderer.js';
import type { TemplateDescriptor } from './types.js';

const log = logger.child('variables');

/**
 * Names of all placeholders used in the template's file contents.
 * Files whose template cannot be read contribute nothing.
 */
export async function extractVariables(descriptor: TemplateDescriptor): Promise<Set<string>> {
  const variables = new Set<string>();

  for (const spec of descriptor.files) {
    let text: string;
    try {
      ({ text } = await resolveFileContent(descriptor, spec));
    } catch (error) {
      log.debug(`Skipping ${spec.path} in ${descriptor.name}: ${getErrorMessage(error)}`);
      continue;
    }

    for (const name of findPlaceholders(text)) {
      variables.add(name);
    }
  }

  return variables;
}

/**
 * Placeholder names mapped to an empty default, sorted by name.
 */
export async function getVariableDefaults(
  descriptor: TemplateDescriptor
): Promise<Record<string, string>> {
  const names = [...(await extractVariables(descriptor))].sort();
  return Object.fromEntries(names.map((name) => [name, '']));
}
