export { StateBox, DEFAULT_RETRY_POLICY, MAX_ISSUE_DESCRIPTION_LENGTH } from './state_box';
export { mergeStateDocuments, normalizeIssueText, isMetadataMapping } from './state_merger';
export { StateBoxError, isStateBoxError, validationError, domainRuleError } from './state_box.errors';
export type { StateBoxErrorKind, StateBoxErrorDetail, DomainRule } from './state_box.errors';
export { SCHEMA_VERSION } from './state_box.types';
export type {
  StateDocument,
  StateMetadata,
  MetadataScalar,
  MetadataMapping,
  MetadataValue,
  TaskEntry,
  IssueEntry,
  RetryPolicy,
  StateBoxOptions,
  SaveOptions,
  MutationOptions,
  TaskUpdate,
  AddIssueInput,
  IssueFilters,
} from './state_box.types';
