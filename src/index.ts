export { DeliveryClient } from "./client";
export { loadConfig } from "./config";
export { RequestBuilder } from "./request/builder";
export { interpretResponse } from "./request/response";
export { UndiciTransport } from "./network/transport";
export { canonicalize } from "./crypto/canonical";
export { sign, signingInput } from "./crypto/signer";
export { encodeQuery, percentEncode } from "./encoding/query";
export {
  scalar,
  sequence,
  mapping,
  isEmpty,
  toParamValue,
} from "./params/value";
export {
  DeliveryError,
  DeliveryErrorKind,
  ConfigurationError,
  ValidationError,
  TransportError,
  MalformedResponseError,
  ProtocolError,
  isDeliveryError,
} from "./errors";
export { registry } from "./metrics";
export { setLogLevel } from "./utils/logger";

export type {
  AutocompleteOptions,
  AutocompleteType,
  DeliveryClientOptions,
  DeliverySearchQuery,
  OrderParams,
} from "./client";
export type { HttpTransport, UndiciTransportOptions } from "./network/transport";
export type { ParamValue, ParamInput, ParamRecord } from "./params/value";
export type {
  ApiResponse,
  ClientIdentity,
  DeliveryClientConfig,
  DeliveryClientInit,
  Identifier,
  LogLevel,
  MethodSecrets,
  SignedRequest,
} from "./types";
