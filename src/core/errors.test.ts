import { describe, it, expect } from "vitest";
import {
  ApiError,
  AuthError,
  FileError,
  NetworkError,
  NotFoundError,
  TTKIAError,
  ValidationError,
  createApiError,
  errorMessage,
} from "./errors";

describe("createApiError", () => {
  it("maps 401 to AuthError", () => {
    const error = createApiError(401, "Unauthorized", "Invalid token");

    expect(error).toBeInstanceOf(AuthError);
    expect(error).toBeInstanceOf(ApiError);
    expect(error.code).toBe("AUTH_ERROR");
    expect(error.status).toBe(401);
    expect(error.body).toBe("Invalid token");
    expect(error.message).toBe("HTTP 401: Unauthorized - Invalid token");
  });

  it("maps 403 to AuthError", () => {
    expect(createApiError(403, "Forbidden", "")).toBeInstanceOf(AuthError);
  });

  it("maps 404 to NotFoundError", () => {
    const error = createApiError(404, "Not Found", "");

    expect(error).toBeInstanceOf(NotFoundError);
    expect(error.code).toBe("NOT_FOUND");
    expect(error.message).toBe("HTTP 404: Not Found");
  });

  it("maps other statuses to a plain ApiError", () => {
    const error = createApiError(500, "Internal Server Error", "boom");

    expect(error).toBeInstanceOf(ApiError);
    expect(error).not.toBeInstanceOf(AuthError);
    expect(error).not.toBeInstanceOf(NotFoundError);
    expect(error.code).toBe("API_ERROR");
    expect(error.details).toBe("boom");
  });
});

describe("error classes", () => {
  it("should set name from the subclass", () => {
    expect(new ValidationError("bad", "queryText").name).toBe("ValidationError");
    expect(new NetworkError("down").name).toBe("NetworkError");
  });

  it("should all extend TTKIAError", () => {
    expect(new ValidationError("bad")).toBeInstanceOf(TTKIAError);
    expect(new NetworkError("down")).toBeInstanceOf(TTKIAError);
    expect(new FileError("missing", "/tmp/x")).toBeInstanceOf(TTKIAError);
  });

  it("should keep the cause of a NetworkError", () => {
    const cause = new TypeError("fetch failed");
    const error = new NetworkError("GET /env failed", { cause, timedOut: true });

    expect(error.cause).toBe(cause);
    expect(error.timedOut).toBe(true);
    expect(error.code).toBe("NETWORK_ERROR");
  });

  it("should default timedOut to false", () => {
    expect(new NetworkError("down").timedOut).toBe(false);
  });

  it("should carry the path of a FileError", () => {
    const error = new FileError("Cannot read", "/tmp/missing.txt");

    expect(error.path).toBe("/tmp/missing.txt");
    expect(error.code).toBe("FILE_ERROR");
  });
});

describe("errorMessage", () => {
  it("returns the message of an Error", () => {
    expect(errorMessage(new Error("boom"))).toBe("boom");
  });

  it("stringifies anything else", () => {
    expect(errorMessage("plain")).toBe("plain");
    expect(errorMessage(42)).toBe("42");
  });
});
