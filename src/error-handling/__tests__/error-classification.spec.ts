import { AxiosError, AxiosHeaders } from "axios";
import { classifySourceFailure, classifyStatus, statusOf } from "../error-classification";
import { SourceMalformedError, SourceRejectedError, SourceUnavailableError } from "../pipeline.errors";

function axiosErrorWithStatus(status: number): AxiosError {
  const error = new AxiosError(`Request failed with status code ${status}`, "ERR_BAD_RESPONSE");
  error.response = {
    status,
    statusText: "",
    data: "",
    headers: {},
    config: { headers: new AxiosHeaders() },
  };
  return error;
}

describe("Error classification", () => {
  describe("classifyStatus", () => {
    it("should treat throttling and server errors as unavailable", () => {
      expect(classifyStatus(429)).toBe("unavailable");
      expect(classifyStatus(503)).toBe("unavailable");
      expect(classifyStatus(408)).toBe("unavailable");
    });

    it("should treat other client errors as rejected", () => {
      expect(classifyStatus(400)).toBe("rejected");
      expect(classifyStatus(401)).toBe("rejected");
      expect(classifyStatus(404)).toBe("rejected");
    });
  });

  describe("statusOf", () => {
    it("should prefer the response status of an axios error", () => {
      expect(statusOf(axiosErrorWithStatus(403))).toBe(403);
    });

    it("should fall back to the message", () => {
      expect(statusOf(new Error("Unexpected server response: 502"))).toBe(502);
    });
  });

  describe("classifySourceFailure", () => {
    it("should return SourceError instances unchanged", () => {
      const original = new SourceRejectedError("bad key", "quotes");
      expect(classifySourceFailure(original, "quotes")).toBe(original);
    });

    it("should map HTTP statuses", () => {
      const unavailable = classifySourceFailure(axiosErrorWithStatus(503), "quotes");
      expect(unavailable).toBeInstanceOf(SourceUnavailableError);
      expect(unavailable.message).toBe("quotes responded with HTTP 503");
      expect(unavailable.retryable).toBe(true);

      const rejected = classifySourceFailure(axiosErrorWithStatus(401), "quotes");
      expect(rejected).toBeInstanceOf(SourceRejectedError);
      expect(rejected.retryable).toBe(false);
      expect(rejected.context).toEqual({ sourceId: "quotes", status: 401 });
    });

    it("should map network error codes to unavailable", () => {
      const error = Object.assign(new Error("connect ECONNREFUSED 127.0.0.1:80"), { code: "ECONNREFUSED" });
      const classified = classifySourceFailure(error, "quotes");
      expect(classified).toBeInstanceOf(SourceUnavailableError);
      expect(classified.cause).toBe(error);
    });

    it("should map parse failures to malformed", () => {
      let parseError: unknown;
      try {
        JSON.parse("{not json");
      } catch (error) {
        parseError = error;
      }
      expect(classifySourceFailure(parseError, "quotes")).toBeInstanceOf(SourceMalformedError);
    });

    it("should map credential messages to rejected and unknown messages to unavailable", () => {
      expect(classifySourceFailure(new Error("Invalid API key supplied"), "quotes")).toBeInstanceOf(
        SourceRejectedError
      );
      expect(classifySourceFailure(new Error("socket hang up"), "quotes")).toBeInstanceOf(SourceUnavailableError);
    });
  });
});
