/**
 * Error taxonomy for the delivery client.
 * @module errors
 */

/** Error kinds for categorizing client failures */
export enum DeliveryErrorKind {
  Configuration = "configuration",
  Validation = "validation",
  Transport = "transport",
  MalformedResponse = "malformed_response",
  Protocol = "protocol",
}

/** Base class for every error the client raises */
export class DeliveryError extends Error {
  public readonly kind: DeliveryErrorKind;

  constructor(kind: DeliveryErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DeliveryError";
    this.kind = kind;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/** No secret registered for a method, or required settings are missing */
export class ConfigurationError extends DeliveryError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(DeliveryErrorKind.Configuration, message, options);
    this.name = "ConfigurationError";
  }
}

/** Call arguments rejected before anything is sent */
export class ValidationError extends DeliveryError {
  constructor(message: string) {
    super(DeliveryErrorKind.Validation, message);
    this.name = "ValidationError";
  }
}

export class TransportError extends DeliveryError {
  public readonly url: string;
  public readonly statusCode?: number;
  public readonly responseBody?: string;

  constructor(
    message: string,
    options: {
      url: string;
      statusCode?: number;
      responseBody?: string;
      cause?: unknown;
    }
  ) {
    super(DeliveryErrorKind.Transport, message, { cause: options.cause });
    this.name = "TransportError";
    this.url = options.url;
    this.statusCode = options.statusCode;
    this.responseBody = options.responseBody;
  }
}

/** Response body could not be read as a JSON object */
export class MalformedResponseError extends DeliveryError {
  public readonly body: string;

  constructor(message: string, body: string, options?: { cause?: unknown }) {
    super(DeliveryErrorKind.MalformedResponse, message, options);
    this.name = "MalformedResponseError";
    this.body = body;
  }
}

/**
 * The API answered with `status: "error"`.
 *
 * `error` is the server-supplied code or message; `response` is the whole
 * parsed body, kept for diagnostics.
 */
export class ProtocolError extends DeliveryError {
  public readonly error: string;
  public readonly response: Readonly<Record<string, unknown>>;

  constructor(error: string, response: Readonly<Record<string, unknown>>) {
    super(
      DeliveryErrorKind.Protocol,
      `API responded with error ${error}. Full output: ${JSON.stringify(response)}`
    );
    this.name = "ProtocolError";
    this.error = error;
    this.response = response;
  }
}

export function isDeliveryError(err: unknown): err is DeliveryError {
  return err instanceof DeliveryError;
}
