/**
 * Template engine exports barrel file.
 */
export { TemplateEngine } from './engine.js';
export type { TemplateEngineOptions } from './engine.js';
export { TemplateCatalog } from './catalog.js';
export { parseManifest, parseManifestContent, findManifestFile, MANIFEST_FILES } from './manifest.js';
export { render, findPlaceholders } from './renderer.js';
export { extractVariables, getVariableDefaults } from './variables.js';
export { createProject, planProject } from './materializer.js';
export { ShellCommandRunner } from './command-runner.js';
export type { ShellCommandRunnerOptions } from './command-runner.js';
export type {
  RenderContext,
  VariableDeclaration,
  FileSpec,
  TemplateDescriptor,
  SkipReason,
  SkippedTemplate,
  ManifestParseResult,
  CommandResult,
  CommandRunner,
  MaterializationStage,
  CreateProjectOptions,
  WrittenFile,
  ProjectCreationResult,
  PlannedFile,
  ProjectPlan,
} from './types.js';
