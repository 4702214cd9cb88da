import { describe, expect, it } from "vitest";
import { makeContext } from "../test-harness";
import { roll } from "./dice";

describe("roll", () => {
  it("defaults to a hundred sides", async () => {
    expect(await roll(makeContext({ random: () => 0 }), "111", "")).toEqual({
      ok: true,
      value: { body: "You rolled 1 (1-100)." },
    });
    const noDigits = await roll(makeContext({ random: () => 0.5 }), "111", "some dice please");
    expect(noDigits.ok && noDigits.value.body).toBe("You rolled 51 (1-100).");
  });

  it("takes the first number in the arguments", async () => {
    const result = await roll(makeContext({ random: () => 0.9999 }), "111", "a d20 or 2d6");
    expect(result.ok && result.value.body).toBe("You rolled 20 (1-20).");
  });

  it("refuses dice with fewer than two sides", async () => {
    for (const args of ["1", "0"]) {
      expect(await roll(makeContext(), "111", args)).toEqual({
        ok: false,
        failure: { kind: "domain", message: "A die needs at least 2 sides." },
      });
    }
  });

  it("refuses sizes it cannot count to", async () => {
    const result = await roll(makeContext(), "111", "99999999999999999999");
    expect(result.ok === false && result.failure.message).toBe("That die is too big to roll.");
  });
});
