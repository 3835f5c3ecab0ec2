import { describe, it, expect } from "vitest";
import { generateSummary } from "./summary";

describe("generateSummary", () => {
  it("uses the text of the first paragraph", () => {
    const html = "<h1>Title</h1><p>First <em>para</em> &amp; more.</p><p>Second.</p>";
    expect(generateSummary(html)).toBe("First para & more.");
  });

  it("falls back to all text when there is no paragraph", () => {
    expect(generateSummary("<div>Loose\n  text</div>")).toBe("Loose text");
  });

  it("returns an empty string for empty HTML", () => {
    expect(generateSummary("")).toBe("");
  });

  it("cuts at a sentence end past half the limit", () => {
    const html = "<p>Aaaa aaaa aaaa. Bbbb bbbb cccc</p>";
    expect(generateSummary(html, 20)).toBe("Aaaa aaaa aaaa.");
  });

  it("cuts at the last space with an ellipsis otherwise", () => {
    const html = "<p>One. Two three four five six seven</p>";
    expect(generateSummary(html, 20)).toBe("One. Two three four...");
  });

  it("hard-cuts text without spaces", () => {
    expect(generateSummary("<p>abcdefghijkl</p>", 5)).toBe("abcde...");
  });
});
