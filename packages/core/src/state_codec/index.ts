export {
  encodeStateDocument,
  decodeStateDocument,
  validateStateDocument,
  isStateDocument,
} from './state_codec';
export type { StateDocumentValidationError } from './state_codec';
export { stateDocumentSchema } from './state_document.schema';
