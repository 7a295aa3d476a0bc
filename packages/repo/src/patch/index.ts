export * from './engine';
export * from './validator';
export * from './response';
export { parseEnvelope, EnvelopeParseError, BEGIN_PATCH, END_PATCH } from './envelope';
export {
  OperationsPayloadSchema,
  OperationsParseError,
  OPERATIONS_JSON_SCHEMA,
  toPatchSet,
} from './operations';
