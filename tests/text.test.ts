import { describe, expect, it } from "vitest";
import { buildPreview, escapeHtml, extractIssueNumber } from "../src/utils/text.js";

describe("buildPreview", () => {
  it("collapses line breaks and truncates long bodies to 100 characters plus an ellipsis", () => {
    const body = `${"a".repeat(60)}\n\n${"b".repeat(88)}`;
    expect(body).toHaveLength(150);

    const preview = buildPreview(body);

    expect(preview).toBe(`${"a".repeat(60)} ${"b".repeat(39)}...`);
    expect(preview).toHaveLength(103);
    expect(preview).not.toMatch(/[\r\n]/);
  });

  it("keeps short bodies whole", () => {
    expect(buildPreview("looks good\r\n\r\nthanks  ")).toBe("looks good thanks");
  });

  it("does not append an ellipsis at exactly 100 characters", () => {
    expect(buildPreview("c".repeat(100))).toBe("c".repeat(100));
  });

  it("treats a missing body as empty", () => {
    expect(buildPreview(undefined)).toBe("");
  });
});

describe("extractIssueNumber", () => {
  it("reads the trailing issue number", () => {
    expect(extractIssueNumber("https://api.github.com/repos/octo/a/issues/42")).toBe(42);
  });

  it("returns null when the URL does not end in an issue reference", () => {
    expect(extractIssueNumber("https://api.github.com/repos/octo/a/pulls/42")).toBeNull();
    expect(extractIssueNumber("https://api.github.com/repos/octo/a/issues/42/comments")).toBeNull();
    expect(extractIssueNumber(undefined)).toBeNull();
  });
});

describe("escapeHtml", () => {
  it("escapes markup characters", () => {
    expect(escapeHtml(`<a href="x">Tom & 'Jerry'</a>`)).toBe(
      "&lt;a href=&quot;x&quot;&gt;Tom &amp; &#39;Jerry&#39;&lt;/a&gt;"
    );
  });
});
