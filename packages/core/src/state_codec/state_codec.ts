/**
 * State document codec: YAML text <-> StateDocument.
 *
 * Encoding is deterministic for a given document (key order follows the
 * object, no line folding, no anchors). Multi-line strings come out as
 * literal blocks. Decoding parses with the JSON schema so timestamps stay
 * strings, then validates the shape with ajv.
 */

import Ajv from 'ajv';
import type { ErrorObject, ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';
import * as yaml from 'js-yaml';
import type { StateDocument } from '../state_box/state_box.types';
import { StateBoxError, validationError } from '../state_box/state_box.errors';
import { stateDocumentSchema } from './state_document.schema';

let cachedValidator: ValidateFunction<StateDocument> | null = null;

function getValidator(): ValidateFunction<StateDocument> {
  if (!cachedValidator) {
    const ajv = new Ajv({ allErrors: true, allowUnionTypes: true });
    addFormats(ajv);
    cachedValidator = ajv.compile<StateDocument>(stateDocumentSchema);
  }
  return cachedValidator;
}

export type StateDocumentValidationError = {
  field: string;
  message: string;
};

function formatErrors(errors: ErrorObject[] | null | undefined): StateDocumentValidationError[] {
  return (errors ?? []).map((error) => ({
    field: error.instancePath || 'root',
    message: error.message || 'Unknown validation error',
  }));
}

/**
 * Checks `data` against the document schema.
 */
export function validateStateDocument(data: unknown): [boolean, StateDocumentValidationError[]] {
  const validate = getValidator();
  const isValid = validate(data);
  return [isValid, isValid ? [] : formatErrors(validate.errors)];
}

export function isStateDocument(data: unknown): data is StateDocument {
  return getValidator()(data);
}

function describeErrors(errors: StateDocumentValidationError[]): string {
  return errors.map((error) => `${error.field}: ${error.message}`).join('; ');
}

/**
 * @throws StateBoxError VALIDATION when `document` would not decode again
 */
export function encodeStateDocument(document: StateDocument): string {
  const [isValid, errors] = validateStateDocument(document);
  if (!isValid) {
    throw validationError(
      errors[0]?.field ?? 'document',
      `Refusing to write invalid state document for release ${document.release}: ${describeErrors(errors)}`,
    );
  }

  try {
    return yaml.dump(document, {
      schema: yaml.DEFAULT_SCHEMA,
      lineWidth: -1,
      noRefs: true,
    });
  } catch (error: unknown) {
    throw new StateBoxError(
      `Failed to encode state document for release ${document.release}`,
      { kind: 'BACKEND', operation: 'encode' },
      { cause: error },
    );
  }
}

/**
 * @throws StateBoxError BACKEND when the text is not YAML or not a state document
 */
export function decodeStateDocument(content: string, source: string = 'document'): StateDocument {
  let parsed: unknown;
  try {
    parsed = yaml.load(content, { schema: yaml.JSON_SCHEMA, filename: source });
  } catch (error: unknown) {
    throw new StateBoxError(
      `Malformed YAML in ${source}`,
      { kind: 'BACKEND', operation: 'decode' },
      { cause: error },
    );
  }

  const validate = getValidator();
  if (!validate(parsed)) {
    throw new StateBoxError(
      `Invalid state document in ${source}: ${describeErrors(formatErrors(validate.errors))}`,
      { kind: 'BACKEND', operation: 'decode' },
    );
  }
  return parsed;
}
