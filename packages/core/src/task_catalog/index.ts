export {
  SUPPORTED_TASK_NAMES,
  WORKFLOW_TASK_NAMES,
  TASK_DISPLAY_NAMES,
  TaskStatuses,
  VALID_TASK_STATUSES,
  DEFAULT_TASK_STATUS,
  isTaskName,
  isTaskStatus,
  isTerminalStatus,
  assertTaskName,
  assertTaskStatus,
} from './task_catalog';
export type { TaskName, TaskStatus } from './task_catalog';
