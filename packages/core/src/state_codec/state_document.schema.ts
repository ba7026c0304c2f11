import type { SchemaObject } from 'ajv';
import { SUPPORTED_TASK_NAMES, VALID_TASK_STATUSES } from '../task_catalog/task_catalog';

const timestamp = { type: 'string', format: 'date-time' };
const nullableTimestamp = { type: ['string', 'null'], format: 'date-time' };
const scalar = { type: ['string', 'number', 'boolean', 'null'] };

/**
 * JSON Schema for the persisted state document.
 * Built from the task catalog so new task names need no schema edit.
 */
export const stateDocumentSchema: SchemaObject = {
  $id: 'statebox/state-document',
  type: 'object',
  required: ['schemaVersion', 'release', 'createdAt', 'updatedAt', 'metadata', 'tasks', 'issues'],
  additionalProperties: false,
  properties: {
    schemaVersion: { type: 'string', minLength: 1 },
    release: { type: 'string', minLength: 1 },
    createdAt: timestamp,
    updatedAt: timestamp,
    metadata: {
      type: 'object',
      additionalProperties: {
        anyOf: [
          scalar,
          { type: 'object', additionalProperties: scalar },
        ],
      },
    },
    tasks: {
      type: 'array',
      items: {
        type: 'object',
        required: ['name', 'status', 'startedAt', 'completedAt', 'result'],
        additionalProperties: false,
        properties: {
          name: { type: 'string', enum: [...SUPPORTED_TASK_NAMES] },
          status: { type: 'string', enum: [...VALID_TASK_STATUSES] },
          startedAt: nullableTimestamp,
          completedAt: nullableTimestamp,
          result: { type: ['string', 'null'] },
        },
      },
    },
    issues: {
      type: 'array',
      items: {
        type: 'object',
        required: ['description', 'reportedAt', 'resolved', 'resolution', 'resolvedAt', 'blocker', 'relatedTasks'],
        additionalProperties: false,
        properties: {
          description: { type: 'string', minLength: 1 },
          reportedAt: timestamp,
          resolved: { type: 'boolean' },
          resolution: { type: ['string', 'null'] },
          resolvedAt: nullableTimestamp,
          blocker: { type: 'boolean' },
          relatedTasks: {
            type: 'array',
            items: { type: 'string', enum: [...SUPPORTED_TASK_NAMES] },
          },
        },
      },
    },
  },
};
