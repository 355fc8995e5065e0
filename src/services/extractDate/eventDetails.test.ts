import { describe, expect, it } from "vitest";
import { extractDetails, hostOf } from "./eventDetails";
import { normalize } from "./normalizer";

describe("hostOf", () => {
  it("reads the common host phrasings", () => {
    expect(hostOf("Hosted by: The Garden Club.")).toBe("The Garden Club");
    expect(hostOf("Live music featuring Ana Rivera")).toBe("Ana Rivera");
    expect(hostOf("with DJs Kool & Remy")).toBe("DJs Kool & Remy");
    expect(hostOf("Bring a friend")).toBeNull();
  });
});

describe("extractDetails", () => {
  it("keeps unused wordy lines as the description and dedupes hosts", () => {
    const lines = normalize("Title here\nPresented by Parks Dept\nFree food and games for all ages\nHosted by Parks Dept\nRSVP now");
    const details = extractDetails(lines, {
      title: {
        candidate: { kind: "title", value: "Title here", raw: "Title here", lineIndex: 0, confidence: 0.5, matcher: "first-line", lineCount: 1 },
        ambiguous: false,
        competitors: 0,
      },
    });
    expect(details).toEqual({ hosts: ["Parks Dept"], description: "Free food and games for all ages" });
  });

  it("omits the description when nothing is left", () => {
    expect(extractDetails(normalize("Short line"), {})).toEqual({ hosts: [] });
  });
});
