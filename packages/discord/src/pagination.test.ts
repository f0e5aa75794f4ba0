import { describe, expect, it, vi } from "vitest";
import { UnsupportedOperationError } from "./errors";
import {
  DEFAULT_TRIGGERS,
  Paginator,
  pagePayload,
  resolveTriggers,
} from "./pagination";

async function* countdown(from: number): AsyncGenerator<string> {
  for (let i = from; i > 0; i--) {
    yield `T-${i}`;
  }
}

function* forever(): Generator<string> {
  let i = 0;
  while (true) {
    yield `page ${i++}`;
  }
}

describe("Paginator", () => {
  it("walks a three page source and stops on the last page", async () => {
    const paginator = new Paginator(["zero", "one", "two"]);

    expect(await paginator.getNextEntry()).toEqual({
      page: { content: "zero" },
      moved: true,
    });
    expect(paginator.state).toBe("at-start");

    expect((await paginator.getNextEntry())?.page.content).toBe("one");
    expect(paginator.state).toBe("mid");
    expect((await paginator.getNextEntry())?.page.content).toBe("two");

    expect(await paginator.getNextEntry()).toEqual({
      page: { content: "two" },
      moved: false,
    });
    expect(paginator.isExhausted).toBe(true);
    expect(paginator.position).toBe(2);
    expect(paginator.state).toBe("at-end");
  });

  it("buffers every page pulled", async () => {
    const paginator = new Paginator(countdown(4));

    for (let i = 0; i < 5; i++) {
      await paginator.getNextEntry();
    }

    expect(paginator.isExhausted).toBe(true);
    expect(paginator.bufferedCount).toBe(4);
  });

  it("moves back through the buffer without touching the source", async () => {
    const pull = vi.fn();
    function* tracked(): Generator<string> {
      for (const page of ["a", "b", "c"]) {
        pull();
        yield page;
      }
    }
    const paginator = new Paginator(tracked());

    await paginator.getNextEntry();
    await paginator.getNextEntry();
    await paginator.getNextEntry();
    pull.mockClear();

    const seen = [
      (await paginator.getPreviousEntry())?.page.content,
      (await paginator.getPreviousEntry())?.page.content,
    ];

    expect(seen).toEqual(["b", "a"]);
    expect(pull).not.toHaveBeenCalled();
  });

  it("treats previous on the first page as a no-op", async () => {
    const paginator = new Paginator(["only"]);
    await paginator.getNextEntry();

    expect(await paginator.getPreviousEntry()).toEqual({
      page: { content: "only" },
      moved: false,
    });
  });

  it("jumps to the first and last pages", async () => {
    const paginator = new Paginator(countdown(3));
    await paginator.getNextEntry();

    expect(await paginator.getLastEntry()).toEqual({
      page: { content: "T-1" },
      moved: true,
    });
    expect(paginator.isExhausted).toBe(true);
    expect(await paginator.getFirstEntry()).toEqual({
      page: { content: "T-3" },
      moved: true,
    });
    expect((await paginator.getFirstEntry())?.moved).toBe(false);
  });

  it("refuses to jump to the end of an infinite source", async () => {
    const paginator = new Paginator(forever(), { infinite: true });
    await paginator.getNextEntry();

    await expect(paginator.getLastEntry()).rejects.toThrow(
      UnsupportedOperationError,
    );
    expect(paginator.bufferedCount).toBe(1);
  });

  it("returns undefined for an empty source", async () => {
    const paginator = new Paginator([]);

    expect(await paginator.getNextEntry()).toBeUndefined();
    expect(paginator.getCurrentEntry()).toBeUndefined();
    expect(paginator.isExhausted).toBe(true);
  });

  it("applies concurrent moves one at a time", async () => {
    const paginator = new Paginator(countdown(5));

    const moves = await Promise.all([
      paginator.getNextEntry(),
      paginator.getNextEntry(),
      paginator.getNextEntry(),
    ]);

    expect(moves.map((move) => move?.page.content)).toEqual([
      "T-5",
      "T-4",
      "T-3",
    ]);
  });
});

describe("resolveTriggers", () => {
  it("defaults to previous, stop and next", () => {
    expect(resolveTriggers(undefined, false)).toEqual(["previous", "stop", "next"]);
    expect(DEFAULT_TRIGGERS).toEqual(["previous", "stop", "next"]);
  });

  it("rejects last for infinite sources", () => {
    expect(() => resolveTriggers(["next", "last"], true)).toThrow(
      UnsupportedOperationError,
    );
  });
});

describe("pagePayload", () => {
  it("clears the parts a page leaves out", () => {
    expect(pagePayload({ content: "hi" })).toEqual({ content: "hi", embeds: [] });
  });
});
