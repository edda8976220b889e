import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { MockAgent } from "undici";
import { TransportError } from "@/errors";
import { UndiciTransport } from "@/network/transport";
import { setLogLevel, resetLogger } from "@/utils/logger";

const ORIGIN = "https://delivery.example.test";
const URL_PATH = "/api/1.0/getIndex";
const HEADERS = {
  "user-agent": "delivery-client-test/1.0",
  "content-type": "application/x-www-form-urlencoded",
};

async function captureTransportError(p: Promise<unknown>): Promise<TransportError> {
  try {
    await p;
  } catch (err) {
    if (err instanceof TransportError) return err;
    throw err;
  }
  throw new Error("expected a TransportError");
}

describe("transport.ts", () => {
  let agent: MockAgent;
  let transport: UndiciTransport;

  beforeEach(() => {
    setLogLevel("error");
    agent = new MockAgent();
    agent.disableNetConnect();
    transport = new UndiciTransport({ dispatcher: agent });
  });

  afterEach(async () => {
    await agent.close();
    resetLogger();
  });

  it("should POST the form body with the given headers and return the text", async () => {
    agent
      .get(ORIGIN)
      .intercept({
        path: URL_PATH,
        method: "POST",
        body: "address=x&",
        headers: { "user-agent": "delivery-client-test/1.0" },
      })
      .reply(200, '{"status":"ok"}');

    const text = await transport.send(`${ORIGIN}${URL_PATH}`, "address=x&", HEADERS);

    expect(text).toBe('{"status":"ok"}');
  });

  it("should raise TransportError with status and body on 5xx", async () => {
    agent.get(ORIGIN).intercept({ path: URL_PATH, method: "POST" }).reply(502, "bad gateway");

    const err = await captureTransportError(
      transport.send(`${ORIGIN}${URL_PATH}`, "address=x&", HEADERS)
    );

    expect(err.statusCode).toBe(502);
    expect(err.responseBody).toBe("bad gateway");
    expect(err.message).toBe("HTTP 502 - bad gateway");
    expect(err.url).toBe(`${ORIGIN}${URL_PATH}`);
  });

  it("should raise TransportError on 4xx", async () => {
    agent.get(ORIGIN).intercept({ path: URL_PATH, method: "POST" }).reply(403, "denied");

    const err = await captureTransportError(
      transport.send(`${ORIGIN}${URL_PATH}`, "address=x&", HEADERS)
    );

    expect(err.statusCode).toBe(403);
  });

  it("should wrap network failures and keep the cause", async () => {
    const err = await captureTransportError(
      transport.send(`${ORIGIN}/api/1.0/unmocked`, "", HEADERS)
    );

    expect(err.statusCode).toBeUndefined();
    expect(err.cause).toBeInstanceOf(Error);
  });
});
