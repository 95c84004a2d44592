export type { Processor, ProcessorContext, ProcessResult, SyncLogger } from './types.js';
export {
  createProjectCreatedProcessor,
  createProjectUpdatedProcessor,
  createProjectDeletedProcessor,
} from './project-processors.js';
export {
  createIssueCreatedProcessor,
  createIssueUpdatedProcessor,
  createIssueDeletedProcessor,
} from './issue-processors.js';
export { projectSnapshotSchema, issueSnapshotSchema, parseSnapshot } from './snapshot-schema.js';
export type { ProjectSnapshot, IssueSnapshot } from './snapshot-schema.js';
