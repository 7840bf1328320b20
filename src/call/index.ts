export { bind, rebindParam, withUrl } from './bind.js';
export { type CallDefinition, defineCall, parseTemplate, rawCall } from './descriptor.js';
export { callIdentity } from './identity.js';
export type {
  BoundCall,
  CallArgs,
  CallDescriptor,
  Decoder,
  ParamSlot,
  ParamValue,
  TemplatePlaceholder,
} from './types.js';
