import { describe, expect, it } from "vitest";
import {
  CATAN_DICE,
  ConfigurationError,
  customDie,
  dieSet,
  expectedDistribution,
  PMF,
  standardDice,
  standardDie,
  TEST_EPS,
} from "../src/index";

describe("PMF basics", () => {
  it("two d6 put 6/36 on 7 and 1/36 on 2 and 12", () => {
    const two = expectedDistribution(CATAN_DICE);
    expect(two.support()).toEqual([2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12]);
    expect(two.probability(7)).toBe(6 / 36);
    expect(two.probability(2)).toBe(1 / 36);
    expect(two.probability(12)).toBe(1 / 36);
    expect(Math.abs(two.mass() - 1)).toBeLessThan(TEST_EPS);
    expect(two.exact).toBe(true);
  });

  it("2d6 is symmetric around 7", () => {
    const two = expectedDistribution(CATAN_DICE);
    for (let k = 2; k <= 12; k++) {
      expect(two.probability(k)).toBe(two.probability(14 - k));
    }
  });

  it("mean and variance of 2d6", () => {
    const two = expectedDistribution(CATAN_DICE);
    expect(two.mean()).toBeCloseTo(7, 12);
    expect(two.variance()).toBeCloseTo(35 / 6, 12);
    expect(two.stddev()).toBeCloseTo(Math.sqrt(35 / 6), 12);
    expect(two.min()).toBe(2);
    expect(two.max()).toBe(12);
  });

  it("repeated face labels carry proportional weight", () => {
    const loaded = PMF.fromDie(customDie([1, 1, 2, 3, 4, 5]));
    expect(loaded.probability(1)).toBe(2 / 6);
    expect(loaded.probability(6)).toBe(0);

    const sum = loaded.convolve(PMF.fromDie(standardDie(6)));
    expect(sum.probability(2)).toBe(2 / 36);
    expect(sum.probability(11)).toBe(1 / 36);
    expect(sum.max()).toBe(11);
  });

  it("iterates [outcome, probability] pairs in ascending order", () => {
    const d4 = PMF.fromDie(standardDie(4));
    expect([...d4]).toEqual([
      [1, 0.25],
      [2, 0.25],
      [3, 0.25],
      [4, 0.25],
    ]);
    expect(d4.toRecord()).toEqual({ 1: 0.25, 2: 0.25, 3: 0.25, 4: 0.25 });
  });

  it("fromRecord normalizes unnormalized masses", () => {
    const p = PMF.fromRecord({ 1: 1, 2: 3, 5: 0 });
    expect(p.probability(2)).toBe(0.75);
    expect(p.support()).toEqual([1, 2]);
    expect(p.exact).toBe(true);
  });
});

describe("Convolution order", () => {
  const d6 = standardDie(6);
  const d8 = standardDie(8);
  const loaded = customDie([1, 1, 2, 3, 4, 5]);

  it("gives the same mapping for every die ordering", () => {
    const reference = expectedDistribution(dieSet(d6, d8, loaded)).toRecord();
    const orders = [
      [d8, d6, loaded],
      [loaded, d6, d8],
      [loaded, d8, d6],
      [d6, loaded, d8],
      [d8, loaded, d6],
    ];
    for (const dice of orders) {
      expect(expectedDistribution(dieSet(...dice)).toRecord()).toEqual(reference);
    }
  });

  it("a.convolve(b) equals b.convolve(a)", () => {
    const a = PMF.fromDie(d8);
    const b = PMF.fromDie(loaded);
    expect(a.convolve(b).toRecord()).toEqual(b.convolve(a).toRecord());
  });

  it("switches to floating-point masses when weights outgrow safe integers", () => {
    const many = expectedDistribution(standardDice(25, 20));
    expect(many.exact).toBe(false);
    expect(Math.abs(many.mass() - 1)).toBeLessThan(TEST_EPS);
    expect(many.mean()).toBeCloseTo(262.5, 6);
  });

  it("floating-point path keeps every achievable sum", () => {
    const pmf = expectedDistribution(standardDice(21, 6));
    expect(pmf.exact).toBe(false);
    expect(pmf.min()).toBe(21);
    expect(pmf.max()).toBe(126);
    expect(pmf.support()).toHaveLength(106);
    expect(pmf.probability(21)).toBeGreaterThan(0);
  });

  it("floating-point path stays order independent", () => {
    const d20 = standardDie(20);
    const d12 = standardDie(12);
    const forward = [
      ...Array.from({ length: 15 }, () => d20),
      ...Array.from({ length: 10 }, () => d12),
    ];
    const backward = [...forward].reverse();
    expect(expectedDistribution(dieSet(...forward)).toRecord()).toEqual(
      expectedDistribution(dieSet(...backward)).toRecord()
    );
  });
});

describe("expectedDistribution validation", () => {
  it("rejects a die set without dice", () => {
    expect(() => expectedDistribution({ dice: [] })).toThrow(ConfigurationError);
  });

  it("rejects a die with a single face", () => {
    expect(() =>
      expectedDistribution({ dice: [standardDie(6), { faces: [3] }] })
    ).toThrow("Die 2 has 1 face(s); at least 2 are required");
  });
});
