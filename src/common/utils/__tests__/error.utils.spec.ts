import { extractStatusCode, toError } from "../error.utils";

describe("Error Utils", () => {
  describe("toError", () => {
    it("should pass Error instances through", () => {
      const error = new Error("boom");
      expect(toError(error)).toBe(error);
    });

    it("should wrap strings and other values", () => {
      expect(toError("boom").message).toBe("boom");
      expect(toError({ code: 1 }).message).toBe('Non-error value thrown: {"code":1}');
    });
  });

  describe("extractStatusCode", () => {
    it("should read status codes from common message shapes", () => {
      expect(extractStatusCode("Unexpected server response: 503")).toBe(503);
      expect(extractStatusCode("Request failed with status code 401")).toBe(401);
      expect(extractStatusCode("404")).toBe(404);
    });

    it("should return null when no code is present", () => {
      expect(extractStatusCode("socket hang up")).toBeNull();
    });
  });
});
