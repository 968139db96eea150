import { describe, it, expect } from "vitest";
import { FormSubmission } from "../src/scraping/navigators/form-submission";
import { ACTION_CAPTIONS } from "../src/config/constants";
import { EncodingError } from "../src/shared/errors/portal.errors";

describe("FormSubmission", () => {
  it("should keep insertion order and write values without percent-encoding", () => {
    const submission = new FormSubmission()
      .set("destdisp", "D1")
      .set("netwrkName", "EXAMPLE-NET")
      .set("regDateS", "2024/01/01")
      .set("action", ACTION_CAPTIONS.SEARCH_ENCODED);

    expect(submission.toString()).toBe(
      "destdisp=D1&netwrkName=EXAMPLE-NET&regDateS=2024/01/01&action=%81%40%8C%9F%8D%F5%81%40"
    );
  });

  it("should replace a value in place when a field is set twice", () => {
    const submission = new FormSubmission().set("a", "1").set("b", "2").set("a", "3");

    expect(submission.toString()).toBe("a=3&b=2");
    expect(submission.size).toBe(2);
  });

  it("should allow repeated names through append", () => {
    const submission = new FormSubmission().set("kind", "x").append("kind", "y");

    expect(submission.names()).toEqual(["kind", "kind"]);
    expect(submission.get("kind")).toBe("x");
    expect(submission.has("missing")).toBe(false);
  });

  it("should transcode the body to Shift_JIS", () => {
    const body = new FormSubmission().set("action", ACTION_CAPTIONS.SEARCH_LITERAL).encode();

    expect(body).toEqual(
      Buffer.concat([
        Buffer.from("action=", "latin1"),
        Buffer.from([0x81, 0x40, 0x8c, 0x9f, 0x8d, 0xf5, 0x81, 0x40]),
      ])
    );
  });

  it("should refuse a value the portal encoding cannot carry", () => {
    const submission = new FormSubmission().set("name_jp", "😀");

    expect(() => submission.encode()).toThrow(EncodingError);
  });
});
