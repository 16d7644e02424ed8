import { describe, expect, it } from "vitest";

import { ID_LENGTH, generateId, isValidId, randomId } from "../id-generator";
import { StorageError } from "../errors";

describe("randomId", () => {
  it("draws fixed-length lowercase alphanumeric ids", () => {
    for (let i = 0; i < 50; i++) {
      expect(randomId()).toMatch(/^[a-z0-9]{8}$/);
    }
    expect(ID_LENGTH).toBe(8);
  });
});

describe("generateId", () => {
  it("regenerates while the candidate is taken", () => {
    const candidates = ["aaaa1111", "aaaa1111", "bbbb2222"];
    const source = () => candidates.shift() ?? "unused00";

    expect(generateId(id => id === "aaaa1111", source)).toBe("bbbb2222");
    expect(candidates).toEqual([]);
  });

  it("gives up when every candidate collides", () => {
    expect(() => generateId(() => true, () => "samesame")).toThrow(StorageError);
  });
});

describe("isValidId", () => {
  it("accepts only path-safe ids", () => {
    expect(isValidId("k3x9a0qz")).toBe(true);
    expect(isValidId("../etc")).toBe(false);
    expect(isValidId("ABC")).toBe(false);
    expect(isValidId("")).toBe(false);
  });
});
