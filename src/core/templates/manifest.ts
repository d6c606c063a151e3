/**
 * Manifest parsing: turns a template directory's `project.yml` into a
 * TemplateDescriptor, or a skip record when the directory is not a usable
 * template.
 *
 * Only `name` is mandatory. Optional fields with the wrong shape fall back
 * to their defaults and are reported as warnings; unknown fields are ignored.
 */
import * as path from 'node:path';
import { z } from 'zod';
import { fileExists, readFile } from '../../utils/file-system.js';
import { parseYaml, formatZodError } from '../../utils/yaml.js';
import { getErrorMessage } from '../../utils/errors.js';
import type {
  FileSpec,
  ManifestParseResult,
  SkipReason,
  TemplateDescriptor,
  VariableDeclaration,
} from './types.js';

/** Manifest file names, in lookup order. */
export const MANIFEST_FILES = ['project.yml', 'project.yaml'] as const;

/** YAML scalars are accepted wherever a string is expected. */
const ScalarSchema = z.union([z.string(), z.number(), z.boolean()]).transform(String);

const OptionalScalarSchema = z.preprocess((value) => value ?? undefined, ScalarSchema.optional());

const ManifestObjectSchema = z.record(z.string(), z.unknown());

const NameSchema = ScalarSchema.pipe(z.string().trim().min(1));

const VariableDeclarationSchema = z.union([
  NameSchema.transform((name): VariableDeclaration => ({ name })),
  z
    .object({
      name: NameSchema,
      description: OptionalScalarSchema,
    })
    .transform(({ name, description }): VariableDeclaration =>
      description === undefined ? { name } : { name, description }
    ),
]);

const FileSpecSchema = z.object({
  path: OptionalScalarSchema,
  source: OptionalScalarSchema,
  content: OptionalScalarSchema,
  template: OptionalScalarSchema,
});

const ListSchema = z.array(z.unknown());

/**
 * Locate the manifest file in a template directory.
 */
export async function findManifestFile(dir: string): Promise<string | null> {
  for (const fileName of MANIFEST_FILES) {
    const candidate = path.join(dir, fileName);
    if (await fileExists(candidate)) {
      return candidate;
    }
  }
  return null;
}

/**
 * Parse the manifest of a template directory.
 */
export async function parseManifest(dir: string): Promise<ManifestParseResult> {
  const sourcePath = path.resolve(dir);
  const manifestPath = await findManifestFile(sourcePath);

  if (!manifestPath) {
    return skip(sourcePath, 'missing-manifest', `No ${MANIFEST_FILES[0]} in ${sourcePath}`);
  }

  let content: string;
  try {
    content = await readFile(manifestPath);
  } catch (error) {
    return skip(sourcePath, 'invalid-manifest', `Cannot read ${manifestPath}: ${getErrorMessage(error)}`);
  }

  return parseManifestContent(content, sourcePath);
}

/**
 * Parse manifest text for the template located at `sourcePath`.
 */
export function parseManifestContent(content: string, sourcePath: string): ManifestParseResult {
  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (error) {
    return skip(sourcePath, 'invalid-yaml', getErrorMessage(error));
  }

  const manifest = ManifestObjectSchema.safeParse(raw);
  if (!manifest.success) {
    return skip(sourcePath, 'invalid-manifest', 'Manifest must be a mapping of fields');
  }
  const fields = manifest.data;

  const name = NameSchema.safeParse(fields.name);
  if (!name.success) {
    return skip(sourcePath, 'missing-name', 'Manifest has no name');
  }

  const warnings: string[] = [];
  const descriptor: TemplateDescriptor = {
    name: name.data,
    variables: readList(fields, 'variables', warnings, parseVariable),
    directories: readList(fields, 'directories', warnings, parseScalar),
    files: readList(fields, 'files', warnings, parseFileSpec),
    postCreateCommands: readList(fields, 'post_create_commands', warnings, parseScalar),
    sourcePath,
  };

  for (const key of ['description', 'author', 'version'] as const) {
    const value = OptionalScalarSchema.safeParse(fields[key]);
    if (!value.success) {
      warnings.push(`${key}: ${formatZodError(value.error)}`);
    } else if (value.data !== undefined) {
      descriptor[key] = value.data;
    }
  }

  return { kind: 'template', descriptor, warnings };
}

type EntryResult<T> = { ok: true; value: T } | { ok: false; warning: string };

/**
 * Read an optional list field, keeping the entries that parse.
 * Rejected entries and a non-list value are recorded in `warnings`.
 */
function readList<T>(
  fields: Record<string, unknown>,
  key: string,
  warnings: string[],
  parseEntry: (entry: unknown, label: string) => EntryResult<T>
): T[] {
  const value = fields[key];
  if (value === undefined || value === null) {
    return [];
  }

  const list = ListSchema.safeParse(value);
  if (!list.success) {
    warnings.push(`${key}: expected a list`);
    return [];
  }

  const entries: T[] = [];
  list.data.forEach((entry, index) => {
    const parsed = parseEntry(entry, `${key}[${index}]`);
    if (parsed.ok) {
      entries.push(parsed.value);
    } else {
      warnings.push(parsed.warning);
    }
  });
  return entries;
}

function parseScalar(entry: unknown, label: string): EntryResult<string> {
  const result = ScalarSchema.safeParse(entry);
  return result.success
    ? { ok: true, value: result.data }
    : { ok: false, warning: `${label}: expected a string` };
}

function parseVariable(entry: unknown, label: string): EntryResult<VariableDeclaration> {
  const result = VariableDeclarationSchema.safeParse(entry);
  return result.success
    ? { ok: true, value: result.data }
    : { ok: false, warning: `${label}: expected a variable with a name` };
}

function parseFileSpec(entry: unknown, label: string): EntryResult<FileSpec> {
  const result = FileSpecSchema.safeParse(entry);
  if (!result.success) {
    return { ok: false, warning: `${label}: expected a mapping with a path` };
  }

  // `source` is an older spelling of `path`
  const { path: filePath, source, content, template } = result.data;
  const target = filePath || source;
  if (!target) {
    return { ok: false, warning: `${label}: file entry has no path` };
  }

  const spec: FileSpec = { path: target };
  if (content !== undefined) spec.content = content;
  if (template) spec.template = template;
  return { ok: true, value: spec };
}

function skip(directory: string, reason: SkipReason, message: string): ManifestParseResult {
  return { kind: 'skipped', skipped: { directory, reason, message } };
}
