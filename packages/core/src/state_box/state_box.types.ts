import type { TaskName, TaskStatus } from '../task_catalog/task_catalog';
import type { VersionedDocumentStore } from '../document_store/document_store';
import type { ReleaseMetadataProvider } from '../metadata_provider/metadata_provider';
import type { Logger } from '../logger';
import type { Clock } from '../utils/time_utils';

export const SCHEMA_VERSION = '1.0';

export type MetadataScalar = string | number | boolean | null;

/** Nested metadata field merged key by key (advisory ids, candidate builds) */
export type MetadataMapping = { [key: string]: MetadataScalar };

export type MetadataValue = MetadataScalar | MetadataMapping;

export type StateMetadata = { [key: string]: MetadataValue };

export type TaskEntry = {
  name: TaskName;
  status: TaskStatus;
  startedAt: string | null;
  completedAt: string | null;
  /** Command output, e-mail addresses redacted */
  result: string | null;
};

export type IssueEntry = {
  description: string;
  reportedAt: string;
  resolved: boolean;
  resolution: string | null;
  resolvedAt: string | null;
  blocker: boolean;
  /** Empty = general issue (affects the whole release) */
  relatedTasks: TaskName[];
};

export type StateDocument = {
  schemaVersion: string;
  release: string;
  createdAt: string;
  updatedAt: string;
  metadata: StateMetadata;
  tasks: TaskEntry[];
  issues: IssueEntry[];
};

export type RetryPolicy = {
  /** Total attempts including the first. Default: 5 */
  maxAttempts: number;
  /** Default: 500 */
  initialBackoffMs: number;
  /** Default: 10000 */
  maxBackoffMs: number;
};

export type StateBoxOptions = {
  release: string;
  store: VersionedDocumentStore;
  /** Supplies metadata for a document that does not exist yet */
  metadataProvider?: ReleaseMetadataProvider;
  /** Directory prefix of the document path. Default: '_releases' */
  pathPrefix?: string;
  retry?: Partial<RetryPolicy>;
  /** Injected for tests; defaults to setTimeout */
  sleep?: (ms: number) => Promise<void>;
  clock?: Clock;
  logger?: Logger;
};

export type SaveOptions = {
  /** Merge and retry on version conflicts. Default: true */
  retry?: boolean;
  /** Commit message for backends that keep history */
  message?: string;
};

export type MutationOptions = {
  /** Persist immediately. Default: true */
  autoSave?: boolean;
};

export type TaskUpdate = {
  status?: string;
  result?: string;
};

export type AddIssueInput = {
  /** Default: true */
  blocker?: boolean;
  relatedTasks?: string[];
};

export type IssueFilters = {
  unresolvedOnly?: boolean;
  blockersOnly?: boolean;
  taskName?: string;
};
