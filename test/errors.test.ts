import { describe, it, expect } from "vitest";
import { inspect } from "node:util";
import { BlogmarkError, ContentNotFoundError, FetchEngineHttpError, FetchError } from "../src/errors.js";

describe("errors", () => {
  it("serializes the code, status and original error", () => {
    const cause = Object.assign(new Error("socket hang up"), { code: "ECONNRESET" });
    const error = new FetchError("Fetch failed: socket hang up", "ERR_FETCH_FAILED", cause, 502);
    const expected = {
      name: "FetchError",
      message: "Fetch failed: socket hang up",
      code: "ERR_FETCH_FAILED",
      statusCode: 502,
      originalError: { name: "Error", message: "socket hang up", code: "ECONNRESET" },
    };

    expect(error.toObject()).toEqual(expected);
    expect(JSON.parse(JSON.stringify(error))).toEqual(expected);
  });

  it("keeps the class hierarchy", () => {
    const error = new FetchEngineHttpError("HTTP error! status: 500", 500);

    expect(error).toBeInstanceOf(FetchError);
    expect(error).toBeInstanceOf(BlogmarkError);
    expect(error.statusCode).toBe(500);
    expect(error.code).toBe("ERR_HTTP_ERROR");
  });

  it("prints the cleaned payload when inspected", () => {
    const error = new ContentNotFoundError();

    expect(inspect(error)).toBe(inspect(error.toObject()));
    expect(error.toObject()).toEqual({
      name: "ContentNotFoundError",
      message: "Could not locate the main content; try another page or retry later.",
      code: "ERR_CONTENT_NOT_FOUND",
    });
  });
});
