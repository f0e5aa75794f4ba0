import { describe, expect, it } from "vitest";
import { ValidationError } from "./errors";
import {
  joinCustomId,
  randomCustomId,
  splitCustomId,
  validateMatch,
} from "./identifier";
import { MAX_CUSTOM_ID_LENGTH } from "./types";

describe("splitCustomId", () => {
  it("splits match and metadata at the first separator", () => {
    expect(splitCustomId("btn:userid42")).toEqual({
      match: "btn",
      metadata: "userid42",
    });
  });

  it("keeps later separators in the metadata", () => {
    expect(splitCustomId("page:3:of:9")).toEqual({
      match: "page",
      metadata: "3:of:9",
    });
  });

  it("returns no metadata without a separator", () => {
    const parts = splitCustomId("confirm");
    expect(parts.match).toBe("confirm");
    expect(parts.metadata).toBeUndefined();
  });

  it("returns empty metadata for a trailing separator", () => {
    expect(splitCustomId("btn:")).toEqual({ match: "btn", metadata: "" });
  });
});

describe("joinCustomId", () => {
  it("joins match and metadata", () => {
    expect(joinCustomId("btn", "userid42")).toBe("btn:userid42");
  });

  it("returns the bare match without metadata", () => {
    expect(joinCustomId("btn")).toBe("btn");
  });

  it("round-trips through splitCustomId", () => {
    const id = joinCustomId("vote", "poll:7");
    expect(splitCustomId(id)).toEqual({ match: "vote", metadata: "poll:7" });
  });

  it("accepts an id of exactly the maximum length", () => {
    const id = joinCustomId("m", "x".repeat(MAX_CUSTOM_ID_LENGTH - 2));
    expect(id.length).toBe(MAX_CUSTOM_ID_LENGTH);
  });

  it("rejects ids over the maximum length", () => {
    expect(() =>
      joinCustomId("m", "x".repeat(MAX_CUSTOM_ID_LENGTH - 1)),
    ).toThrow(ValidationError);
  });

  it("rejects a match containing the separator", () => {
    expect(() => joinCustomId("a:b", "c")).toThrow(ValidationError);
  });
});

describe("validateMatch", () => {
  it("rejects an empty match", () => {
    expect(() => validateMatch("")).toThrow(ValidationError);
  });

  it("returns a valid match unchanged", () => {
    expect(validateMatch("profile-edit")).toBe("profile-edit");
  });
});

describe("randomCustomId", () => {
  it("generates distinct valid matches", () => {
    const a = randomCustomId();
    const b = randomCustomId();
    expect(a).not.toBe(b);
    expect(validateMatch(a)).toBe(a);
  });
});
