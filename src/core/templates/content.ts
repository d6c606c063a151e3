/**
 * Resolution of a file spec's raw (unrendered) content.
 */
import * as path from 'node:path';
import { fileExists, isPathInside, readFile } from '../../utils/file-system.js';
import { ErrorCodes, SecurityError } from '../../utils/errors.js';
import type { FileSpec, TemplateDescriptor } from './types.js';

export interface ResolvedContent {
  source: 'content' | 'template' | 'empty';
  text: string;
  /** Set when the spec names a template file that does not exist */
  missingTemplate?: string;
}

/**
 * Absolute path of a spec's template file. The file must lie inside the
 * template's source directory.
 */
export function resolveTemplateFile(descriptor: TemplateDescriptor, templateFile: string): string {
  const absolute = path.resolve(descriptor.sourcePath, templateFile);
  if (!isPathInside(descriptor.sourcePath, absolute)) {
    throw new SecurityError(
      ErrorCodes.PATH_TRAVERSAL,
      `Template file '${templateFile}' resolves outside template '${descriptor.name}'`,
      { template: descriptor.name, templateFile }
    );
  }
  return absolute;
}

/**
 * Pick the content source for a spec: inline content, then the template
 * file, then nothing. A template file missing from disk counts as empty.
 */
export async function resolveFileContent(
  descriptor: TemplateDescriptor,
  spec: FileSpec
): Promise<ResolvedContent> {
  if (spec.content !== undefined) {
    return { source: 'content', text: spec.content };
  }

  if (spec.template) {
    const templatePath = resolveTemplateFile(descriptor, spec.template);
    if (!(await fileExists(templatePath))) {
      return { source: 'empty', text: '', missingTemplate: templatePath };
    }
    return { source: 'template', text: await readFile(templatePath) };
  }

  return { source: 'empty', text: '' };
}
