import { request, type Dispatcher } from "undici";

import { TransportError } from "../errors";
import { log } from "../utils/logger";

/**
 * Sends an already signed form body and returns the raw response text.
 * Implementations raise TransportError on any network or HTTP failure.
 */
export interface HttpTransport {
  send(
    url: string,
    body: string,
    headers: Readonly<Record<string, string>>
  ): Promise<string>;
}

export interface UndiciTransportOptions {
  /** Custom dispatcher (agent, proxy, MockAgent); defaults to undici's global one */
  dispatcher?: Dispatcher;
}

export class UndiciTransport implements HttpTransport {
  private readonly dispatcher?: Dispatcher;

  constructor(opts: UndiciTransportOptions = {}) {
    this.dispatcher = opts.dispatcher;
  }

  async send(
    url: string,
    body: string,
    headers: Readonly<Record<string, string>>
  ): Promise<string> {
    let res: Dispatcher.ResponseData;
    let text: string;
    try {
      res = await request(url, {
        method: "POST",
        headers: { ...headers },
        body,
        ...(this.dispatcher ? { dispatcher: this.dispatcher } : {}),
      });
      text = await res.body.text();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      log.error(`Request failed: ${reason}`, { url });
      throw new TransportError(`Request to ${url} failed: ${reason}`, {
        url,
        cause: error,
      });
    }

    if (res.statusCode >= 400) {
      const errorMessage = `HTTP ${res.statusCode} - ${text}`;
      const meta = { status: res.statusCode, url, response: text };

      if (res.statusCode >= 500) {
        log.warn(`Server error: ${errorMessage}`, meta);
      } else if (res.statusCode === 401 || res.statusCode === 403) {
        log.error(`Authentication/authorization error: ${errorMessage}`, {
          ...meta,
          hint: "Check client_id, sender_id and the method key",
        });
      } else {
        log.error(`Client error: ${errorMessage}`, meta);
      }

      throw new TransportError(errorMessage, {
        url,
        statusCode: res.statusCode,
        responseBody: text,
      });
    }

    log.debug("Request successful", { status: res.statusCode, url });
    return text;
  }
}
