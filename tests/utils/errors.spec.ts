import { AxiosError, CanceledError } from "axios";
import { describe, expect, it } from "vitest";

import {
  CancelledError,
  DirectoryError,
  HttpStatusError,
  NetworkError,
  ParseError,
  classifyError,
  isRetryable,
  statusError,
} from "../../src/utils/errors";

describe("classifyError", () => {
  it("maps socket error codes to NetworkError", () => {
    const reset = Object.assign(new Error("socket hang up"), { code: "ECONNRESET" });
    const classified = classifyError(reset);

    expect(classified).toBeInstanceOf(NetworkError);
    expect(classified).toMatchObject({ code: "ECONNRESET" });
  });

  it("maps axios transport errors to NetworkError", () => {
    const timeout = new AxiosError("timeout of 10ms exceeded", "ECONNABORTED");
    expect(classifyError(timeout)).toBeInstanceOf(NetworkError);
  });

  it("maps aborts to CancelledError", () => {
    expect(classifyError(new CanceledError())).toBeInstanceOf(CancelledError);
    const abort = new Error("aborted");
    abort.name = "AbortError";
    expect(classifyError(abort)).toBeInstanceOf(CancelledError);
  });

  it("passes through errors it does not recognise", () => {
    const other = new TypeError("bad");
    expect(classifyError(other)).toBe(other);
    const parse = new ParseError("broken", "state.json");
    expect(classifyError(parse)).toBe(parse);
  });
});

describe("statusError", () => {
  it("treats 5xx as retryable network errors", () => {
    const error = statusError(503);
    expect(error).toBeInstanceOf(NetworkError);
    expect(error.message).toBe("HTTP 503");
    expect(isRetryable(error)).toBe(true);
  });

  it("treats other statuses as final", () => {
    const error = statusError(404);
    expect(error).toBeInstanceOf(HttpStatusError);
    expect(error.message).toBe("HTTP 404");
    expect(isRetryable(error)).toBe(false);
  });
});

describe("error messages", () => {
  it("include the offending path", () => {
    expect(new ParseError("Invalid manifest JSON", "m.json").message).toBe(
      "Invalid manifest JSON (m.json)",
    );
    expect(new DirectoryError("Output directory is not writable", "/x").message).toBe(
      "Output directory is not writable: /x",
    );
    expect(new CancelledError().name).toBe("CancelledError");
  });
});
