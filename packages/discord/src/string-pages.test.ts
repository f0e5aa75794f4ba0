import { describe, expect, it } from "vitest";
import { ValidationError } from "./errors";
import { paginateString, splitLine, syncPaginateString } from "./string-pages";

async function* fromArray(lines: string[]): AsyncGenerator<string> {
  yield* lines;
}

describe("splitLine", () => {
  it("breaks after the last space within the limit", () => {
    expect(splitLine("aaaa bbbb cccc dd", 10)).toEqual(["aaaa bbbb ", "cccc dd"]);
  });

  it("prefers a newline to a space", () => {
    expect(splitLine("ab\ncd ef gh", 8)).toEqual(["ab\n", "cd ef gh"]);
  });

  it("hard breaks words longer than the limit", () => {
    expect(splitLine("abcdefghij", 4)).toEqual(["abcd", "efgh", "ij"]);
  });
});

describe("syncPaginateString", () => {
  it("keeps short input on one page", () => {
    expect([...syncPaginateString(["hello", "world"])]).toEqual(["hello\nworld"]);
  });

  it("starts a new page at the line limit", () => {
    expect([...syncPaginateString(["a", "b", "c"], { lineLimit: 2 })]).toEqual([
      "a\nb",
      "c",
    ]);
  });

  it("counts line breaks towards the character limit", () => {
    expect([...syncPaginateString(["12345", "6789"], { charLimit: 10 })]).toEqual([
      "12345\n6789",
    ]);
    expect([...syncPaginateString(["12345", "67890"], { charLimit: 10 })]).toEqual([
      "12345",
      "67890",
    ]);
  });

  it("splits an over-long line and keeps its tail for the next lines", () => {
    expect(
      [...syncPaginateString(["aaaa bbbb cccc dd", "ee"], { charLimit: 10 })],
    ).toEqual(["aaaa bbbb ", "cccc dd\nee"]);
  });

  it("applies the wrapper within the character limit", () => {
    const pages = [
      ...syncPaginateString(["12345", "67890"], { charLimit: 12, wrapper: "[{}]" }),
    ];

    expect(pages).toEqual(["[12345]", "[67890]"]);
  });

  it("yields nothing for no lines", () => {
    expect([...syncPaginateString([])]).toEqual([]);
  });

  it("rejects a wrapper without a placeholder", () => {
    expect(() => [...syncPaginateString(["x"], { wrapper: "```" })]).toThrow(
      ValidationError,
    );
  });
});

describe("paginateString", () => {
  it("keeps an async source async", async () => {
    const pages: string[] = [];
    for await (const page of paginateString(fromArray(["a", "b", "c"]), { lineLimit: 2 })) {
      pages.push(page);
    }

    expect(pages).toEqual(["a\nb", "c"]);
  });

  it("returns a plain iterator for arrays", () => {
    expect([...paginateString(["one"])]).toEqual(["one"]);
  });
});
