/**
 * Project materialization: produces a directory tree from a template and a
 * render context.
 *
 * Stages run in order: resolve template, check destination, create
 * directories, write files, run post-create commands. Every stage is
 * attempted once.
 *
 * Failure policy is deliberately asymmetric:
 * - A directory or file that cannot be created aborts the call with
 *   FileWriteError. Files written before the failure stay on disk.
 * - A post-create command that fails is logged as a warning and recorded in
 *   the result; creation still succeeds.
 */
import * as path from 'node:path';
import {
  ensureDir,
  fileExists,
  isDirectory,
  isDirectoryEmpty,
  isPathInside,
  writeFile,
} from '../../utils/file-system.js';
import {
  DestinationConflictError,
  ErrorCodes,
  FileWriteError,
  PostCommandError,
  SecurityError,
  SkellyError,
  TemplateNotFoundError,
  getErrorMessage,
} from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import type { TemplateCatalog } from './catalog.js';
import { ShellCommandRunner } from './command-runner.js';
import { resolveFileContent } from './content.js';
import { render } from './renderer.js';
import type {
  CommandResult,
  CommandRunner,
  CreateProjectOptions,
  FileSpec,
  MaterializationStage,
  PlannedFile,
  ProjectCreationResult,
  ProjectPlan,
  RenderContext,
  TemplateDescriptor,
  WrittenFile,
} from './types.js';

const log = logger.child('materializer');

/**
 * Create a project from a catalog template.
 *
 * @throws TemplateNotFoundError when the template is not in the catalog
 * @throws DestinationConflictError when the destination is a non-empty
 *   directory and `overwrite` is not set
 * @throws FileWriteError when a directory or file cannot be written
 * @throws SecurityError when a rendered path escapes the destination
 */
export async function createProject(
  catalog: TemplateCatalog,
  templateName: string,
  destination: string,
  context: RenderContext,
  options: CreateProjectOptions = {}
): Promise<ProjectCreationResult> {
  let stage: MaterializationStage = 'idle';
  const advance = (next: MaterializationStage): void => {
    log.debug(`${stage} -> ${next}`);
    stage = next;
    options.onStage?.(next);
  };

  try {
    const descriptor = lookupTemplate(catalog, templateName);
    advance('template-resolved');

    const projectPath = path.resolve(destination);
    const createdDestination = await prepareDestination(projectPath, options.overwrite ?? false);
    advance('destination-checked');

    const directories = await createDirectories(descriptor, projectPath, context);
    advance('directories-created');

    const files: WrittenFile[] = [];
    for (const spec of descriptor.files) {
      files.push(await writeFileSpec(descriptor, spec, projectPath, context));
    }
    advance('files-written');

    const commands =
      options.runPostCreate === false
        ? []
        : await runPostCreateCommands(
            descriptor,
            projectPath,
            context,
            options.commandRunner ?? new ShellCommandRunner()
          );
    advance('commands-run');

    advance('done');
    return {
      template: descriptor.name,
      projectPath,
      createdDestination,
      directories,
      files,
      commands,
    };
  } catch (error) {
    advance('failed');
    throw error;
  }
}

/**
 * Compute what createProject would do without touching the disk.
 */
export async function planProject(
  catalog: TemplateCatalog,
  templateName: string,
  destination: string,
  context: RenderContext
): Promise<ProjectPlan> {
  const descriptor = lookupTemplate(catalog, templateName);
  const projectPath = path.resolve(destination);

  const destinationExists = await fileExists(projectPath);
  const conflict =
    destinationExists && (!(await isDirectory(projectPath)) || !(await isDirectoryEmpty(projectPath)));

  const directories = descriptor.directories.map(
    (template) => relativeTo(projectPath, resolveInside(projectPath, render(template, context), 'Directory'))
  );

  const files: PlannedFile[] = [];
  for (const spec of descriptor.files) {
    const absolutePath = resolveInside(projectPath, render(spec.path, context), 'File');
    const resolved = await resolveFileContent(descriptor, spec);
    files.push({
      path: relativeTo(projectPath, absolutePath),
      absolutePath,
      source: resolved.source,
      content: resolved.text ? render(resolved.text, context) : '',
      exists: await fileExists(absolutePath),
    });
  }

  return {
    template: descriptor.name,
    projectPath,
    destinationExists,
    conflict,
    directories,
    files,
    commands: descriptor.postCreateCommands.map((command) => render(command, context)),
  };
}

function lookupTemplate(catalog: TemplateCatalog, templateName: string): TemplateDescriptor {
  const descriptor = catalog.get(templateName);
  if (!descriptor) {
    throw new TemplateNotFoundError(templateName, catalog.names());
  }
  return descriptor;
}

/**
 * Make sure the destination can receive the project.
 * Returns true when the directory had to be created.
 */
async function prepareDestination(projectPath: string, overwrite: boolean): Promise<boolean> {
  if (await fileExists(projectPath)) {
    if (!(await isDirectory(projectPath))) {
      throw new FileWriteError(projectPath, `Destination ${projectPath} exists and is not a directory`);
    }
    if (!overwrite && !(await isDirectoryEmpty(projectPath))) {
      throw new DestinationConflictError(projectPath);
    }
    return false;
  }

  try {
    await ensureDir(projectPath);
  } catch (error) {
    throw new FileWriteError(
      projectPath,
      `Failed to create directory ${projectPath}: ${getErrorMessage(error)}`,
      error
    );
  }
  return true;
}

async function createDirectories(
  descriptor: TemplateDescriptor,
  projectPath: string,
  context: RenderContext
): Promise<string[]> {
  const created: string[] = [];

  for (const template of descriptor.directories) {
    const dirPath = resolveInside(projectPath, render(template, context), 'Directory');
    try {
      await ensureDir(dirPath);
    } catch (error) {
      throw new FileWriteError(
        dirPath,
        `Failed to create directory ${dirPath}: ${getErrorMessage(error)}`,
        error
      );
    }
    created.push(relativeTo(projectPath, dirPath));
  }

  return created;
}

async function writeFileSpec(
  descriptor: TemplateDescriptor,
  spec: FileSpec,
  projectPath: string,
  context: RenderContext
): Promise<WrittenFile> {
  const filePath = resolveInside(projectPath, render(spec.path, context), 'File');

  try {
    const resolved = await resolveFileContent(descriptor, spec);
    if (resolved.missingTemplate) {
      log.warn(`Template file ${resolved.missingTemplate} not found; creating empty ${spec.path}`);
    }

    const content = resolved.text ? render(resolved.text, context) : '';
    await writeFile(filePath, content);

    return {
      path: relativeTo(projectPath, filePath),
      absolutePath: filePath,
      source: resolved.source,
      bytes: Buffer.byteLength(content, 'utf-8'),
    };
  } catch (error) {
    if (error instanceof SkellyError) {
      throw error;
    }
    log.error(`Error processing file ${filePath}`);
    throw new FileWriteError(filePath, `Failed to write ${filePath}: ${getErrorMessage(error)}`, error);
  }
}

async function runPostCreateCommands(
  descriptor: TemplateDescriptor,
  projectPath: string,
  context: RenderContext,
  runner: CommandRunner
): Promise<CommandResult[]> {
  const results: CommandResult[] = [];

  for (const template of descriptor.postCreateCommands) {
    const command = render(template, context);
    log.info(`Running: ${command}`);

    let result: CommandResult;
    try {
      result = await runner.run(command, projectPath);
    } catch (error) {
      result = { command, success: false, exitCode: null, stdout: '', stderr: getErrorMessage(error) };
    }

    if (!result.success) {
      // Not fatal: the project tree is already complete.
      const failure = new PostCommandError(command, result.exitCode, result.stderr, {
        signal: result.signal,
        timedOut: result.timedOut,
      });
      log.warn(failure.message, result.stderr ? { stderr: result.stderr.trim() } : undefined);
    }
    results.push(result);
  }

  return results;
}

/**
 * Resolve a rendered relative path under the project root, rejecting
 * paths that escape it.
 */
function resolveInside(projectPath: string, relative: string, kind: 'Directory' | 'File'): string {
  const absolute = path.resolve(projectPath, relative);
  if (!isPathInside(projectPath, absolute)) {
    throw new SecurityError(
      ErrorCodes.PATH_TRAVERSAL,
      `${kind} path '${relative}' resolves outside ${projectPath}`,
      { projectPath, path: relative }
    );
  }
  return absolute;
}

function relativeTo(projectPath: string, absolute: string): string {
  return path.relative(projectPath, absolute).split(path.sep).join('/');
}
