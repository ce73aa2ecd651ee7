import { describe, it, expect } from "vitest";
import { createNameGenerator } from "../../src/lib/names.js";
import { ConfigError } from "../../src/lib/errors.js";

describe("createNameGenerator", () => {
  it("produces prefixed ids with a process token and counter", () => {
    const nextId = createNameGenerator();
    expect(nextId()).toMatch(/^cel-[0-9a-f]{8}-\d+$/);
  });

  it("uses a custom prefix", () => {
    const nextId = createNameGenerator({ prefix: "walk_cycle" });
    expect(nextId()).toMatch(/^walk_cycle-[0-9a-f]{8}-\d+$/);
  });

  it("never repeats across generators sharing a prefix", () => {
    const a = createNameGenerator();
    const b = createNameGenerator();
    const ids = [a(), b(), a(), b(), a()];

    expect(new Set(ids).size).toBe(5);
  });

  it("counts upward", () => {
    const nextId = createNameGenerator();
    const first = Number(nextId().split("-").pop());
    const second = Number(nextId().split("-").pop());
    expect(second).toBe(first + 1);
  });

  it("rejects prefixes that are not CSS identifiers", () => {
    expect(() => createNameGenerator({ prefix: "1cel" })).toThrow(ConfigError);
    expect(() => createNameGenerator({ prefix: "cel anim" })).toThrow(ConfigError);
    expect(() => createNameGenerator({ prefix: "" })).toThrow('Invalid keyframe name prefix ""');
  });
});
