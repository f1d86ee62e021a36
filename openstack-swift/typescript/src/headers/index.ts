/**
 * Swift header maps and typed field accessors.
 *
 * @module headers
 */

export { Headers } from './headers.js';
export {
  type FieldState,
  type ValidatableField,
  StringField,
  ReadonlyStringField,
  Uint64Field,
  UINT64_MAX,
  ReadonlyUint64Field,
  UnixTimestampField,
  UnixTimeField,
  HttpTimestampField,
  MetadataField,
} from './fields.js';
export { HeaderSet, AccountHeaders, ContainerHeaders, ObjectHeaders } from './sets.js';
