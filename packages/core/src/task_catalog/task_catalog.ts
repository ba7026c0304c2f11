/**
 * Task Catalog
 *
 * The closed set of workflow steps a release document can track, and the
 * status values a task can hold.
 *
 * @module task_catalog
 */

import { validationError } from '../state_box/state_box.errors';

export const SUPPORTED_TASK_NAMES = [
  'create-test-report',
  'take-ownership',
  'update-bug-list',
  'image-consistency-check',
  'analyze-candidate-build',
  'analyze-promoted-build',
  'check-greenwave-cvp-tests',
  'check-cve-tracker-bug',
  'push-to-cdn-staging',
  'stage-testing',
  'image-signed-check',
  'drop-bugs',
  'change-advisory-status',
] as const;

export type TaskName = typeof SUPPORTED_TASK_NAMES[number];

/**
 * Tasks tracked through the release lifecycle.
 * One-time or optional steps (test report, bug list, greenwave, drop bugs) are left out.
 */
export const WORKFLOW_TASK_NAMES: readonly TaskName[] = [
  'take-ownership',
  'image-consistency-check',
  'analyze-candidate-build',
  'analyze-promoted-build',
  'check-cve-tracker-bug',
  'push-to-cdn-staging',
  'stage-testing',
  'image-signed-check',
  'change-advisory-status',
];

export const TASK_DISPLAY_NAMES: Record<TaskName, string> = {
  'create-test-report': 'Create Test Report',
  'take-ownership': 'Take Ownership',
  'update-bug-list': 'Update Bug List',
  'image-consistency-check': 'Image Consistency Check',
  'analyze-candidate-build': 'Analyze Candidate Build',
  'analyze-promoted-build': 'Analyze Promoted Build',
  'check-greenwave-cvp-tests': 'Check Greenwave CVP Tests',
  'check-cve-tracker-bug': 'Check CVE Tracker Bug',
  'push-to-cdn-staging': 'Push to CDN Staging',
  'stage-testing': 'Stage Testing',
  'image-signed-check': 'Image Signed Check',
  'drop-bugs': 'Drop Bugs',
  'change-advisory-status': 'Change Advisory Status',
};

export const TaskStatuses = {
  NotStarted: 'Not Started',
  InProgress: 'In Progress',
  Pass: 'Pass',
  Fail: 'Fail',
} as const;

export type TaskStatus = typeof TaskStatuses[keyof typeof TaskStatuses];

export const VALID_TASK_STATUSES: readonly TaskStatus[] = Object.values(TaskStatuses);

export const DEFAULT_TASK_STATUS: TaskStatus = TaskStatuses.NotStarted;

export function isTaskName(value: unknown): value is TaskName {
  return typeof value === 'string' && (SUPPORTED_TASK_NAMES as readonly string[]).includes(value);
}

export function isTaskStatus(value: unknown): value is TaskStatus {
  return typeof value === 'string' && (VALID_TASK_STATUSES as readonly string[]).includes(value);
}

export function isTerminalStatus(status: TaskStatus): boolean {
  return status === TaskStatuses.Pass || status === TaskStatuses.Fail;
}

/**
 * @throws StateBoxError VALIDATION for blank or unsupported names
 */
export function assertTaskName(value: string): TaskName {
  if (!value || !value.trim()) {
    throw validationError('taskName', 'Task name must be a non-empty string', value);
  }
  if (!isTaskName(value)) {
    throw validationError(
      'taskName',
      `Unsupported task name: '${value}'. Must be one of: ${SUPPORTED_TASK_NAMES.join(', ')}`,
      value,
    );
  }
  return value;
}

/**
 * @throws StateBoxError VALIDATION for values outside the four statuses
 */
export function assertTaskStatus(value: string): TaskStatus {
  if (!isTaskStatus(value)) {
    throw validationError(
      'status',
      `Invalid task status: ${value}. Must be one of ${VALID_TASK_STATUSES.join(', ')}`,
      value,
    );
  }
  return value;
}
