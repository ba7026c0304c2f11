/**
 * Two-way merge of a local state document into the remote copy,
 * used when a save loses the race to another writer.
 *
 * Remote is the base. Local changes win for metadata keys and whole task
 * entries; issues are matched by text and the resolved side wins, so a
 * resolution recorded by either writer is never dropped.
 */

import type { IssueEntry, MetadataMapping, MetadataValue, StateDocument, StateMetadata, TaskEntry } from './state_box.types';

export function isMetadataMapping(value: MetadataValue | undefined): value is MetadataMapping {
  return typeof value === 'object' && value !== null;
}

export function normalizeIssueText(text: string): string {
  return text.trim().toLowerCase();
}

function mergeMetadata(local: StateMetadata, remote: StateMetadata): StateMetadata {
  const merged: StateMetadata = { ...remote };
  for (const [key, localValue] of Object.entries(local)) {
    if (localValue === null) {
      continue;
    }
    const remoteValue = merged[key];
    merged[key] = isMetadataMapping(localValue) && isMetadataMapping(remoteValue)
      ? { ...remoteValue, ...localValue }
      : localValue;
  }
  return merged;
}

function mergeTasks(local: TaskEntry[], remote: TaskEntry[]): TaskEntry[] {
  const localByName = new Map(local.map((task) => [task.name, task]));
  const merged = remote.map((task) => localByName.get(task.name) ?? task);
  const remoteNames = new Set(remote.map((task) => task.name));
  for (const task of local) {
    if (!remoteNames.has(task.name)) {
      merged.push(task);
    }
  }
  return merged;
}

function pickIssueVersion(local: IssueEntry, remote: IssueEntry): IssueEntry {
  if (local.resolved && !remote.resolved) {
    return {
      ...remote,
      resolved: true,
      resolution: local.resolution,
      resolvedAt: local.resolvedAt,
    };
  }
  if (local.resolved && remote.resolved) {
    if ((local.resolvedAt ?? '') > (remote.resolvedAt ?? '')) {
      return { ...remote, resolution: local.resolution, resolvedAt: local.resolvedAt };
    }
    return remote;
  }
  return remote;
}

/**
 * Remote index matching a local issue, preferring the same report
 * (text and reportedAt), then an open remote issue with the same text,
 * then, for a resolved local issue, a resolved remote one.
 */
function findMatchingIssue(local: IssueEntry, remote: IssueEntry[], taken: Set<number>): number {
  const text = normalizeIssueText(local.description);
  const candidates = remote
    .map((issue, index) => ({ issue, index }))
    .filter(({ issue, index }) => !taken.has(index) && normalizeIssueText(issue.description) === text);

  const sameReport = candidates.find(({ issue }) => issue.reportedAt === local.reportedAt);
  if (sameReport) {
    return sameReport.index;
  }
  const open = candidates.find(({ issue }) => !issue.resolved);
  if (open) {
    return open.index;
  }
  if (local.resolved) {
    const resolved = candidates.find(({ issue }) => issue.resolved);
    if (resolved) {
      return resolved.index;
    }
  }
  return -1;
}

function mergeIssues(local: IssueEntry[], remote: IssueEntry[]): IssueEntry[] {
  const merged = [...remote];
  const taken = new Set<number>();
  for (const issue of local) {
    const index = findMatchingIssue(issue, remote, taken);
    const match = index >= 0 ? remote[index] : undefined;
    if (match) {
      taken.add(index);
      merged[index] = pickIssueVersion(issue, match);
    } else {
      merged.push(issue);
    }
  }
  return merged;
}

/**
 * Merges `local` into `remote` without touching either argument.
 * Document identity (schemaVersion, release, createdAt, updatedAt) comes from remote.
 */
export function mergeStateDocuments(local: StateDocument, remote: StateDocument): StateDocument {
  const localCopy = structuredClone(local);
  const remoteCopy = structuredClone(remote);
  return {
    ...remoteCopy,
    metadata: mergeMetadata(localCopy.metadata, remoteCopy.metadata),
    tasks: mergeTasks(localCopy.tasks, remoteCopy.tasks),
    issues: mergeIssues(localCopy.issues, remoteCopy.issues),
  };
}
