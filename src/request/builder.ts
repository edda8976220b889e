import { ConfigurationError } from "../errors";
import { sign } from "../crypto/signer";
import { encodeQuery } from "../encoding/query";
import {
  extend,
  scalar,
  toParamMapping,
  withoutEmpty,
  type Mapping,
  type ParamRecord,
} from "../params/value";
import type {
  ClientIdentity,
  DeliveryClientConfig,
  MethodSecrets,
  SignedRequest,
} from "../types";

export interface RequestBuilderOptions {
  identity: ClientIdentity;
  secrets: MethodSecrets;
  apiUrl: string;
  apiVersion: string;
  userAgent: string;
}

/**
 * Turns a method name and its parameters into a signed POST request.
 * Holds only immutable settings; does no I/O.
 */
export class RequestBuilder {
  private readonly opts: Readonly<RequestBuilderOptions>;

  constructor(opts: RequestBuilderOptions) {
    this.opts = Object.freeze({ ...opts });
  }

  static fromConfig(cfg: DeliveryClientConfig): RequestBuilder {
    return new RequestBuilder({
      identity: { clientId: cfg.clientId, senderId: cfg.senderId },
      secrets: cfg.methodKeys,
      apiUrl: cfg.apiUrl,
      apiVersion: cfg.apiVersion,
      userAgent: cfg.userAgent,
    });
  }

  hasMethod(method: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.opts.secrets, method);
  }

  /**
   * @throws {ConfigurationError} when no method key is registered for `method`
   * @throws {ValidationError} when `params` holds values that cannot be sent
   */
  build(method: string, params: ParamRecord | Mapping = {}): SignedRequest {
    const secret = this.hasMethod(method) ? this.opts.secrets[method] : undefined;
    if (secret === undefined) {
      throw new ConfigurationError(
        `Method ${method} has no method key defined for it`
      );
    }
    const { identity } = this.opts;

    const data = extend(toParamMapping(params), [
      ["client_id", scalar(identity.clientId)],
      ["sender_id", scalar(identity.senderId)],
    ]);
    const signature = sign(data, secret);
    const signed = withoutEmpty(
      extend(data, [["secret_key", scalar(signature)]])
    );

    return {
      method,
      url: [this.opts.apiUrl, this.opts.apiVersion, method].join("/"),
      httpMethod: "POST",
      headers: {
        "user-agent": this.opts.userAgent,
        "content-type": "application/x-www-form-urlencoded",
      },
      body: encodeQuery(signed),
      signature,
    };
  }
}
