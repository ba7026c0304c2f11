/**
 * StateBox - persistent workflow state for one release
 *
 * Owns the load/save lifecycle of the release's state document and the
 * task, metadata and issue mutations built on it. Writers in different
 * processes coordinate only through the store's version token: a stale save
 * re-fetches the remote document, merges, and retries with backoff.
 *
 * @example
 * ```typescript
 * const box = new StateBox({ release: '4.19.1', store });
 * await box.updateTask('stage-testing', { status: 'In Progress' });
 * await box.addIssue('Stage push failed', { relatedTasks: ['push-to-cdn-staging'] });
 * ```
 */

import type { DocumentSnapshot, VersionedDocumentStore } from '../document_store/document_store';
import type { ReleaseMetadataProvider } from '../metadata_provider/metadata_provider';
import type { Logger } from '../logger';
import type { Clock } from '../utils/time_utils';
import type { TaskName, TaskStatus } from '../task_catalog/task_catalog';
import type {
  AddIssueInput,
  IssueEntry,
  IssueFilters,
  MetadataValue,
  MutationOptions,
  RetryPolicy,
  SaveOptions,
  StateBoxOptions,
  StateDocument,
  StateMetadata,
  TaskEntry,
  TaskUpdate,
} from './state_box.types';
import { SCHEMA_VERSION } from './state_box.types';
import { DocumentStoreError, isVersionConflict } from '../document_store/document_store.errors';
import { StaticReleaseMetadataProvider } from '../metadata_provider/metadata_provider';
import { createLogger } from '../logger';
import { formatTimestamp, systemClock } from '../utils/time_utils';
import { buildStatePath, DEFAULT_PATH_PREFIX } from '../utils/release_utils';
import { extractEndTimestamp, extractStartTimestamp, maskSensitiveData } from '../utils/text_utils';
import {
  assertTaskName,
  assertTaskStatus,
  DEFAULT_TASK_STATUS,
  isTerminalStatus,
  TaskStatuses,
} from '../task_catalog/task_catalog';
import { decodeStateDocument, encodeStateDocument } from '../state_codec/state_codec';
import { isMetadataMapping, mergeStateDocuments, normalizeIssueText } from './state_merger';
import { StateBoxError, domainRuleError, isStateBoxError, validationError } from './state_box.errors';

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 5,
  initialBackoffMs: 500,
  maxBackoffMs: 10_000,
};

export const MAX_ISSUE_DESCRIPTION_LENGTH = 1000;

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

type RemoteState = {
  document: StateDocument;
  version: string;
};

export class StateBox {
  readonly release: string;
  private readonly path: string;
  private readonly store: VersionedDocumentStore;
  private readonly metadataProvider: ReleaseMetadataProvider;
  private readonly retryPolicy: RetryPolicy;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly clock: Clock;
  private readonly logger: Logger;

  /** Last document loaded or saved by this instance */
  private cachedDocument: StateDocument | null = null;
  /** Version token of cachedDocument; null = not persisted yet */
  private cachedVersion: string | null = null;

  /**
   * @throws StateBoxError VALIDATION when `release` is not X.Y.Z
   */
  constructor(options: StateBoxOptions) {
    this.release = options.release;
    this.path = buildStatePath(options.release, options.pathPrefix ?? DEFAULT_PATH_PREFIX);
    this.store = options.store;
    this.metadataProvider = options.metadataProvider ?? new StaticReleaseMetadataProvider();
    this.retryPolicy = { ...DEFAULT_RETRY_POLICY, ...options.retry };
    this.sleep = options.sleep ?? defaultSleep;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? createLogger('[StateBox] ');
  }

  getPath(): string {
    return this.path;
  }

  async exists(): Promise<boolean> {
    try {
      return await this.store.exists(this.path);
    } catch (error: unknown) {
      throw this.wrapBackendError('exists', error);
    }
  }

  // ─────────────────────────────────────────────────────────
  // Load / Save
  // ─────────────────────────────────────────────────────────

  /**
   * Returns the cached document, reading the store on a cache miss or when
   * `forceRefresh` is set. A missing document yields a fresh default one
   * that is not persisted until the next save.
   */
  async load(forceRefresh: boolean = false): Promise<StateDocument> {
    if (this.cachedDocument && !forceRefresh) {
      return this.cachedDocument;
    }

    const remote = await this.fetchRemote();
    if (remote) {
      this.logger.debug(`Loaded ${this.path} at version ${remote.version}`);
      this.cachedDocument = remote.document;
      this.cachedVersion = remote.version;
      return remote.document;
    }

    this.logger.debug(`No state at ${this.path}, starting from defaults`);
    const document = await this.createDefaultDocument();
    this.cachedDocument = document;
    this.cachedVersion = null;
    return document;
  }

  /**
   * Persists `document`. Version conflicts are merged and retried unless
   * `retry` is false.
   *
   * @returns The document as written (merged with remote changes when a retry happened)
   * @throws StateBoxError CONCURRENCY on a conflict with retry disabled, or after the last attempt
   * @throws StateBoxError BACKEND for any other store failure
   */
  async save(document: StateDocument, options: SaveOptions = {}): Promise<StateDocument> {
    const retry = options.retry ?? true;
    const { maxAttempts, initialBackoffMs, maxBackoffMs } = this.retryPolicy;
    let current = document;
    // Cache pair (document, version) only changes together, on success
    let expectedVersion = this.cachedVersion;
    let backoffMs = initialBackoffMs;
    current.updatedAt = this.now();

    for (let attempt = 1; ; attempt++) {
      try {
        const version = await this.persist(current, expectedVersion, options.message);
        this.cachedDocument = current;
        this.cachedVersion = version;
        this.logger.debug(`Saved ${this.path} at version ${version} (attempt ${attempt})`);
        return current;
      } catch (error: unknown) {
        if (!isVersionConflict(error)) {
          throw this.wrapBackendError('save', error);
        }

        if (!retry) {
          const actualVersion = (await this.fetchRemote())?.version ?? null;
          throw new StateBoxError(
            `Version conflict saving ${this.path}: expected ${expectedVersion ?? '(new document)'}, found ${actualVersion ?? '(missing)'}`,
            { kind: 'CONCURRENCY', expectedVersion, actualVersion, attempts: attempt },
            { cause: error },
          );
        }

        if (attempt >= maxAttempts) {
          throw new StateBoxError(
            `Failed to save ${this.path} after ${attempt} attempts due to concurrent modifications`,
            { kind: 'CONCURRENCY', expectedVersion, actualVersion: null, attempts: attempt },
            { cause: error },
          );
        }

        this.logger.warn(`Conflict saving ${this.path} (attempt ${attempt}/${maxAttempts}), retrying in ${backoffMs}ms`);
        await this.sleep(backoffMs);
        backoffMs = Math.min(backoffMs * 2, maxBackoffMs);

        const remote = await this.fetchRemote();
        if (remote) {
          current = mergeStateDocuments(current, remote.document);
          this.logger.info(`Merged local changes into ${this.path} version ${remote.version}`);
        }
        current.updatedAt = this.now();
        expectedVersion = remote?.version ?? null;
      }
    }
  }

  /**
   * JSON of the current document, loading it first when nothing is cached.
   */
  async toJson(indent: number = 2): Promise<string> {
    return JSON.stringify(await this.load(), null, indent);
  }

  // ─────────────────────────────────────────────────────────
  // Tasks
  // ─────────────────────────────────────────────────────────

  /**
   * Creates or updates a task.
   * Timestamps reported inside `result` take precedence over the clock.
   */
  async updateTask(name: string, update: TaskUpdate, options: MutationOptions = {}): Promise<StateDocument> {
    const taskName = assertTaskName(name);
    const status = update.status !== undefined ? assertTaskStatus(update.status) : undefined;

    const document = await this.load();
    let task = document.tasks.find((entry) => entry.name === taskName);
    if (!task) {
      task = { name: taskName, status: DEFAULT_TASK_STATUS, startedAt: null, completedAt: null, result: null };
      document.tasks.push(task);
      this.logger.debug(`Created task ${taskName}`);
    }

    const timestampSource = update.result ?? task.result;
    const firstTimestamp = extractStartTimestamp(timestampSource);
    const lastTimestamp = extractEndTimestamp(timestampSource);

    if (status !== undefined) {
      task.status = status;
      if (status === TaskStatuses.InProgress) {
        task.startedAt = firstTimestamp ?? this.now();
        task.completedAt = null;
      } else if (isTerminalStatus(status)) {
        task.completedAt = lastTimestamp ?? this.now();
        if (task.startedAt === null) {
          task.startedAt = firstTimestamp ?? task.completedAt;
        }
      }
    }

    if (update.result !== undefined) {
      task.result = maskSensitiveData(update.result);
    }

    this.logger.info(`Updated task ${taskName}${status ? `: ${status}` : ''}`);

    if (options.autoSave ?? true) {
      return this.save(document, { message: `Update task ${taskName}${status ? `: ${status}` : ''}` });
    }
    return document;
  }

  /**
   * @returns A copy of the task, or null when it has never been updated
   */
  async getTask(name: string): Promise<TaskEntry | null> {
    const taskName = assertTaskName(name);
    const document = await this.load();
    const task = document.tasks.find((entry) => entry.name === taskName);
    return task ? { ...task } : null;
  }

  /**
   * @returns The task status, or null when it has never been updated
   */
  async getTaskStatus(name: string): Promise<TaskStatus | null> {
    return (await this.getTask(name))?.status ?? null;
  }

  // ─────────────────────────────────────────────────────────
  // Metadata
  // ─────────────────────────────────────────────────────────

  /**
   * Mapping values are merged into existing mappings; everything else replaces.
   */
  async updateMetadata(updates: StateMetadata, options: MutationOptions = {}): Promise<StateDocument> {
    const document = await this.load();
    for (const [key, value] of Object.entries(updates)) {
      const existing = document.metadata[key];
      document.metadata[key] = isMetadataMapping(value) && isMetadataMapping(existing) ? { ...existing, ...value } : value;
      this.logger.debug(`Updated metadata ${key}`);
    }

    if (options.autoSave ?? true) {
      return this.save(document, { message: 'Update metadata' });
    }
    return document;
  }

  async getMetadata(): Promise<StateMetadata>;
  async getMetadata(key: string): Promise<MetadataValue | undefined>;
  async getMetadata(key?: string): Promise<StateMetadata | MetadataValue | undefined> {
    const document = await this.load();
    const metadata = structuredClone(document.metadata);
    return key === undefined ? metadata : metadata[key];
  }

  // ─────────────────────────────────────────────────────────
  // Issues
  // ─────────────────────────────────────────────────────────

  /**
   * Records an issue, or returns the unresolved issue with the same text.
   *
   * @throws StateBoxError VALIDATION for blank or oversized text and unknown task names
   * @throws StateBoxError DOMAIN_RULE when a related task already has an unresolved blocker
   */
  async addIssue(description: string, input: AddIssueInput = {}, options: MutationOptions = {}): Promise<IssueEntry> {
    validateIssueDescription(description);
    const blocker = input.blocker ?? true;
    const relatedTasks = [...new Set((input.relatedTasks ?? []).map((name) => assertTaskName(name)))];

    const document = await this.load();

    if (blocker) {
      for (const taskName of relatedTasks) {
        const existing = findTaskBlocker(document.issues, taskName);
        if (existing) {
          throw domainRuleError(
            'DUPLICATE_BLOCKER',
            `Task '${taskName}' already has unresolved blocker: ${existing.description}`,
            [existing.description],
          );
        }
      }
    }

    const normalized = normalizeIssueText(description);
    const duplicate = document.issues.find(
      (issue) => !issue.resolved && normalizeIssueText(issue.description) === normalized,
    );
    if (duplicate) {
      this.logger.info(`Issue already exists: ${duplicate.description}`);
      return { ...duplicate, relatedTasks: [...duplicate.relatedTasks] };
    }

    const issue: IssueEntry = {
      description,
      reportedAt: this.now(),
      resolved: false,
      resolution: null,
      resolvedAt: null,
      blocker,
      relatedTasks,
    };
    document.issues.push(issue);

    const scope = relatedTasks.length > 0 ? `tasks: ${relatedTasks.join(', ')}` : 'general';
    this.logger.info(`Added ${blocker ? 'blocking' : 'non-blocking'} issue (${scope}): ${description}`);

    if (options.autoSave ?? true) {
      await this.save(document, { message: `Add issue: ${description.slice(0, 50)}` });
    }
    return { ...issue, relatedTasks: [...issue.relatedTasks] };
  }

  /**
   * Resolves the unresolved issue whose text equals `text` (case-insensitive),
   * else the single one containing it.
   *
   * @throws StateBoxError DOMAIN_RULE ISSUE_NOT_FOUND (candidates = unresolved issues)
   * or AMBIGUOUS_ISSUE (candidates = matching issues)
   */
  async resolveIssue(text: string, resolution: string, options: MutationOptions = {}): Promise<IssueEntry> {
    const document = await this.load();
    const needle = normalizeIssueText(text);
    const unresolved = document.issues.filter((issue) => !issue.resolved);

    let match = unresolved.find((issue) => normalizeIssueText(issue.description) === needle);
    if (!match) {
      const partial = needle ? unresolved.filter((issue) => normalizeIssueText(issue.description).includes(needle)) : [];
      if (partial.length > 1) {
        throw domainRuleError(
          'AMBIGUOUS_ISSUE',
          `Multiple issues match '${text}':\n${partial.map((issue) => `  - ${issue.description}`).join('\n')}\n` +
          'Please provide more specific text to uniquely identify the issue.',
          partial.map((issue) => issue.description),
        );
      }
      match = partial[0];
    }
    if (!match) {
      const descriptions = unresolved.map((issue) => issue.description);
      throw domainRuleError(
        'ISSUE_NOT_FOUND',
        `Issue not found: '${text}'. Unresolved issues: ${descriptions.length > 0 ? descriptions.join('; ') : '(none)'}`,
        descriptions,
      );
    }

    match.resolved = true;
    match.resolution = resolution;
    match.resolvedAt = this.now();
    this.logger.info(`Resolved issue: ${match.description}`);

    const resolved = { ...match, relatedTasks: [...match.relatedTasks] };
    if (options.autoSave ?? true) {
      await this.save(document, { message: `Resolve issue: ${text.slice(0, 50)}` });
    }
    return resolved;
  }

  /**
   * @returns The unresolved blocker referencing the task, or null
   */
  async getTaskBlocker(name: string): Promise<IssueEntry | null> {
    const taskName = assertTaskName(name);
    const document = await this.load();
    const blocker = findTaskBlocker(document.issues, taskName);
    return blocker ? { ...blocker, relatedTasks: [...blocker.relatedTasks] } : null;
  }

  async getIssues(filters: IssueFilters = {}): Promise<IssueEntry[]> {
    const taskName = filters.taskName !== undefined ? assertTaskName(filters.taskName) : undefined;
    const document = await this.load();
    return document.issues
      .filter((issue) => !filters.unresolvedOnly || !issue.resolved)
      .filter((issue) => !filters.blockersOnly || issue.blocker)
      .filter((issue) => taskName === undefined || issue.relatedTasks.includes(taskName))
      .map((issue) => ({ ...issue, relatedTasks: [...issue.relatedTasks] }));
  }

  /**
   * Unresolved blockers not tied to any task.
   */
  async getGeneralBlockers(): Promise<IssueEntry[]> {
    const document = await this.load();
    return document.issues
      .filter((issue) => issue.blocker && !issue.resolved && issue.relatedTasks.length === 0)
      .map((issue) => ({ ...issue, relatedTasks: [] }));
  }

  // ─────────────────────────────────────────────────────────
  // Private helpers
  // ─────────────────────────────────────────────────────────

  private now(): string {
    return formatTimestamp(this.clock());
  }

  private async createDefaultDocument(): Promise<StateDocument> {
    let metadata: StateMetadata;
    try {
      metadata = await this.metadataProvider.getReleaseMetadata(this.release);
    } catch (error: unknown) {
      throw this.wrapBackendError('load metadata', error);
    }
    const now = this.now();
    return {
      schemaVersion: SCHEMA_VERSION,
      release: this.release,
      createdAt: now,
      updatedAt: now,
      metadata,
      tasks: [],
      issues: [],
    };
  }

  private async fetchRemote(): Promise<RemoteState | null> {
    let snapshot: DocumentSnapshot | null;
    try {
      snapshot = await this.store.read(this.path);
    } catch (error: unknown) {
      throw this.wrapBackendError('read', error);
    }
    if (!snapshot) {
      return null;
    }
    return {
      document: decodeStateDocument(snapshot.content, this.path),
      version: snapshot.version,
    };
  }

  /**
   * Single save attempt. The remote version is re-read right before the
   * write; a mismatch is reported as a conflict without writing.
   */
  private async persist(
    document: StateDocument,
    expectedVersion: string | null,
    message: string | undefined,
  ): Promise<string> {
    const content = encodeStateDocument(document);
    const writeOptions = { message: message ?? `Update state for ${this.release}` };

    if (expectedVersion === null) {
      return this.store.create(this.path, content, writeOptions);
    }

    const remote = await this.store.read(this.path);
    if (remote?.version !== expectedVersion) {
      throw new DocumentStoreError(
        `Version conflict on ${this.path} (expected ${expectedVersion}, found ${remote?.version ?? 'nothing'})`,
        'VERSION_CONFLICT',
      );
    }
    return this.store.write(this.path, content, expectedVersion, writeOptions);
  }

  private wrapBackendError(operation: string, error: unknown): StateBoxError {
    if (isStateBoxError(error)) {
      return error;
    }
    const message = error instanceof Error ? error.message : String(error);
    return new StateBoxError(
      `StateBox ${operation} failed for ${this.path}: ${message}`,
      {
        kind: 'BACKEND',
        operation,
        ...(error instanceof DocumentStoreError ? { storeCode: error.code } : {}),
      },
      { cause: error },
    );
  }
}

function findTaskBlocker(issues: IssueEntry[], taskName: TaskName): IssueEntry | undefined {
  return issues.find((issue) => issue.blocker && !issue.resolved && issue.relatedTasks.includes(taskName));
}

function validateIssueDescription(description: string): void {
  if (!description || !description.trim()) {
    throw validationError('description', 'Issue description must be a non-empty string', description);
  }
  if (description.length > MAX_ISSUE_DESCRIPTION_LENGTH) {
    throw validationError(
      'description',
      `Issue description too long (${description.length} chars, max ${MAX_ISSUE_DESCRIPTION_LENGTH})`,
      description,
    );
  }
}
