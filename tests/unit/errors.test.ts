import { describe, it, expect } from "vitest";
import { classifyFailure, findErrorCode, transportCategory } from "../../src/driver/errors";
import { HttpStatusError, MalformedResponseError } from "../../src/errors";
import { transportError } from "../helpers/fakes";

describe("classifyFailure", () => {
  it("reports a fired timeout as client_abort whatever was thrown", () => {
    expect(classifyFailure(new Error("aborted"), true)).toBe("client_abort");
    expect(classifyFailure(transportError("ECONNRESET"), true)).toBe("client_abort");
  });

  it("treats undici's own timeouts as client_abort", () => {
    expect(classifyFailure(transportError("UND_ERR_HEADERS_TIMEOUT"), false)).toBe("client_abort");
    expect(classifyFailure(transportError("UND_ERR_BODY_TIMEOUT", "terminated"), false)).toBe(
      "client_abort",
    );
  });

  it.each([
    ["ECONNREFUSED", "client_error: ConnectError"],
    ["ENOTFOUND", "client_error: ConnectError"],
    ["UND_ERR_CONNECT_TIMEOUT", "client_error: ConnectTimeout"],
    ["ECONNRESET", "client_error: ReadError"],
    ["UND_ERR_SOCKET", "client_error: ReadError"],
    ["EPIPE", "client_error: WriteError"],
    ["HPE_INVALID_CONSTANT", "client_error: RemoteProtocolError"],
  ])("maps %s to %s", (code, expected) => {
    expect(classifyFailure(transportError(code), false)).toBe(expected);
  });

  it("falls back to RequestError for an unidentified fetch failure", () => {
    expect(classifyFailure(new TypeError("fetch failed"), false)).toBe("client_error: RequestError");
  });

  it("names anything else by its error class", () => {
    expect(classifyFailure(new HttpStatusError(500, "boom"), false)).toBe(
      "unexpected_error: HttpStatusError",
    );
    expect(classifyFailure(new MalformedResponseError("no choices"), false)).toBe(
      "unexpected_error: MalformedResponseError",
    );
    expect(classifyFailure(new SyntaxError("Unexpected token"), false)).toBe(
      "unexpected_error: SyntaxError",
    );
    expect(classifyFailure(new TypeError("x is not a function"), false)).toBe(
      "unexpected_error: TypeError",
    );
    expect(classifyFailure("oops", false)).toBe("unexpected_error: string");
  });
});

describe("findErrorCode", () => {
  it("walks the cause chain", () => {
    const inner = Object.assign(new Error("refused"), { code: "ECONNREFUSED" });
    const middle = new Error("connect failed", { cause: inner });
    const outer = new TypeError("fetch failed", { cause: middle });
    expect(findErrorCode(outer)).toBe("ECONNREFUSED");
  });

  it("returns undefined without a code", () => {
    expect(findErrorCode(new Error("plain"))).toBeUndefined();
    expect(findErrorCode(undefined)).toBeUndefined();
  });
});

describe("transportCategory", () => {
  it("ignores errors that are not transport failures", () => {
    expect(transportCategory(new SyntaxError("bad json"))).toBeUndefined();
  });
});
