/**
 * Template engine facade used by the CLI.
 * Wraps one catalog; every operation reads it and none modifies it.
 */
import { TemplateCatalog } from './catalog.js';
import { createProject, planProject } from './materializer.js';
import { getVariableDefaults } from './variables.js';
import type {
  CommandRunner,
  CreateProjectOptions,
  ProjectCreationResult,
  ProjectPlan,
  RenderContext,
  TemplateDescriptor,
} from './types.js';

export interface TemplateEngineOptions {
  /** Runner for post-create commands (default: system shell) */
  commandRunner?: CommandRunner;
}

export class TemplateEngine {
  constructor(
    public readonly catalog: TemplateCatalog,
    private readonly options: TemplateEngineOptions = {}
  ) {}

  /**
   * Load the catalog from a template repository directory.
   */
  static async fromDirectory(root: string, options?: TemplateEngineOptions): Promise<TemplateEngine> {
    return new TemplateEngine(await TemplateCatalog.load(root), options);
  }

  listTemplates(): string[] {
    return this.catalog.names();
  }

  getTemplate(name: string): TemplateDescriptor | undefined {
    return this.catalog.get(name);
  }

  /**
   * Placeholders used by the template's files, each mapped to "".
   * Unknown templates yield an empty mapping.
   */
  async getTemplateVariables(name: string): Promise<Record<string, string>> {
    const descriptor = this.catalog.get(name);
    return descriptor ? getVariableDefaults(descriptor) : {};
  }

  async createProject(
    name: string,
    destination: string,
    context: RenderContext,
    overwrite = false,
    options: Omit<CreateProjectOptions, 'overwrite'> = {}
  ): Promise<ProjectCreationResult> {
    return createProject(this.catalog, name, destination, context, {
      commandRunner: this.options.commandRunner,
      ...options,
      overwrite,
    });
  }

  async planProject(name: string, destination: string, context: RenderContext): Promise<ProjectPlan> {
    return planProject(this.catalog, name, destination, context);
  }
}
