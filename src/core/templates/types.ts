/**
 * Template engine type definitions.
 */

/**
 * Values substituted into placeholders for one project creation.
 */
export type RenderContext = Record<string, string>;

/**
 * An advisory variable declaration from a manifest.
 */
export interface VariableDeclaration {
  name: string;
  description?: string;
}

/**
 * One file to produce. Content comes from `content`, else from the
 * `template` file inside the template directory, else the file is empty.
 */
export interface FileSpec {
  /** Renderable path relative to the project root */
  path: string;
  /** Inline content */
  content?: string;
  /** Template file relative to the template's source directory */
  template?: string;
}

/**
 * A parsed template manifest.
 */
export interface TemplateDescriptor {
  name: string;
  description?: string;
  author?: string;
  version?: string;
  variables: VariableDeclaration[];
  directories: string[];
  files: FileSpec[];
  postCreateCommands: string[];
  /** Absolute path of the template directory */
  sourcePath: string;
}

/** Why a directory was not added to the catalog. */
export type SkipReason =
  | 'missing-manifest'
  | 'invalid-yaml'
  | 'invalid-manifest'
  | 'missing-name'
  | 'duplicate-name';

/**
 * A directory left out of the catalog, with the reason.
 */
export interface SkippedTemplate {
  directory: string;
  reason: SkipReason;
  message: string;
}

export type ManifestParseResult =
  | { kind: 'template'; descriptor: TemplateDescriptor; warnings: string[] }
  | { kind: 'skipped'; skipped: SkippedTemplate };

/**
 * Outcome of a single post-create command.
 */
export interface CommandResult {
  command: string;
  success: boolean;
  /** Exit code, or null when the command did not exit on its own */
  exitCode: number | null;
  stdout: string;
  stderr: string;
  /** Signal that terminated the command */
  signal?: string;
  /** The command was killed after running past its time limit */
  timedOut?: boolean;
}

/**
 * Runs a command string with a working directory.
 */
export interface CommandRunner {
  run(command: string, cwd: string): Promise<CommandResult>;
}

/** Stages of a single createProject call. */
export type MaterializationStage =
  | 'idle'
  | 'template-resolved'
  | 'destination-checked'
  | 'directories-created'
  | 'files-written'
  | 'commands-run'
  | 'done'
  | 'failed';

export interface CreateProjectOptions {
  /** Write into an existing non-empty destination */
  overwrite?: boolean;
  /** Run post-create commands (default: true) */
  runPostCreate?: boolean;
  /** Executes post-create commands (default: shell runner) */
  commandRunner?: CommandRunner;
  /** Called on every stage transition */
  onStage?: (stage: MaterializationStage) => void;
}

/**
 * A file written by createProject.
 */
export interface WrittenFile {
  /** Path relative to the project root */
  path: string;
  absolutePath: string;
  source: 'content' | 'template' | 'empty';
  bytes: number;
}

/**
 * Result of a successful createProject call.
 */
export interface ProjectCreationResult {
  template: string;
  projectPath: string;
  /** Whether the destination directory had to be created */
  createdDestination: boolean;
  directories: string[];
  files: WrittenFile[];
  commands: CommandResult[];
}

/**
 * A file that createProject would write.
 */
export interface PlannedFile {
  path: string;
  absolutePath: string;
  source: 'content' | 'template' | 'empty';
  content: string;
  exists: boolean;
}

/**
 * What createProject would do, computed without writing anything.
 */
export interface ProjectPlan {
  template: string;
  projectPath: string;
  destinationExists: boolean;
  /** createProject would fail with DestinationConflictError without overwrite */
  conflict: boolean;
  directories: string[];
  files: PlannedFile[];
  commands: string[];
}
