/**
 * The template catalog: every usable template found under a repository
 * directory, keyed by manifest name. Built once and read-only afterwards.
 */
import * as path from 'node:path';
import { isDirectory, listSubdirectories } from '../../utils/file-system.js';
import { ManifestLoadError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { parseManifest } from './manifest.js';
import type { SkippedTemplate, TemplateDescriptor } from './types.js';

const log = logger.child('catalog');

export class TemplateCatalog {
  private readonly templates: ReadonlyMap<string, TemplateDescriptor>;

  private constructor(
    public readonly root: string,
    templates: Map<string, TemplateDescriptor>,
    public readonly skipped: readonly SkippedTemplate[]
  ) {
    this.templates = templates;
  }

  /**
   * Scan the immediate sub-directories of `root` for templates.
   * A bad manifest excludes only its own directory.
   */
  static async load(root: string): Promise<TemplateCatalog> {
    const absoluteRoot = path.resolve(root);
    const templates = new Map<string, TemplateDescriptor>();
    const skipped: SkippedTemplate[] = [];

    if (!(await isDirectory(absoluteRoot))) {
      log.warn(`Template directory not found: ${absoluteRoot}`);
      return new TemplateCatalog(absoluteRoot, templates, skipped);
    }

    for (const dirName of await listSubdirectories(absoluteRoot, { includeHidden: true })) {
      const result = await parseManifest(path.join(absoluteRoot, dirName));

      if (result.kind === 'skipped') {
        skipped.push(result.skipped);
        if (result.skipped.reason === 'missing-manifest') {
          log.debug(`Ignoring ${dirName}: no manifest`);
        } else {
          const error = new ManifestLoadError(result.skipped.directory, result.skipped.message);
          log.warn(`Error loading template ${dirName}: ${error.message}`);
        }
        continue;
      }

      const { descriptor, warnings } = result;
      for (const warning of warnings) {
        log.warn(`Template ${descriptor.name}: ${warning}`);
      }

      const existing = templates.get(descriptor.name);
      if (existing) {
        const message = `Duplicate template name '${descriptor.name}' (already loaded from ${existing.sourcePath})`;
        skipped.push({ directory: descriptor.sourcePath, reason: 'duplicate-name', message });
        log.warn(`Error loading template ${dirName}: ${message}`);
        continue;
      }

      templates.set(descriptor.name, descriptor);
    }

    log.debug(`Loaded ${templates.size} template(s) from ${absoluteRoot}`);
    return new TemplateCatalog(absoluteRoot, templates, skipped);
  }

  /**
   * Build a catalog from descriptors that are already in memory.
   */
  static fromDescriptors(root: string, descriptors: TemplateDescriptor[]): TemplateCatalog {
    const templates = new Map<string, TemplateDescriptor>();
    for (const descriptor of descriptors) {
      if (!templates.has(descriptor.name)) {
        templates.set(descriptor.name, descriptor);
      }
    }
    return new TemplateCatalog(path.resolve(root), templates, []);
  }

  get size(): number {
    return this.templates.size;
  }

  /** Template names in discovery order. */
  names(): string[] {
    return [...this.templates.keys()];
  }

  get(name: string): TemplateDescriptor | undefined {
    return this.templates.get(name);
  }

  has(name: string): boolean {
    return this.templates.has(name);
  }

  descriptors(): TemplateDescriptor[] {
    return [...this.templates.values()];
  }
}
