/**
 * Project listing exports barrel file.
 */
export { listProjects, formatModified } from './lister.js';
export type { ProjectInfo } from './lister.js';
