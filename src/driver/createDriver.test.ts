import { describe, it, expect } from "vitest";
import { createDriver, selectArrayId } from "./createDriver";

describe("selectArrayId", () => {
  it("defaults to the Tablet of Fire", () => {
    expect(selectArrayId({})).toBe("tablet_of_fire");
    expect(selectArrayId({ requested: "  " })).toBe("tablet_of_fire");
  });

  it("uses the requested array", () => {
    expect(selectArrayId({ requested: "Tablet of Air" })).toBe("tablet_of_air");
    expect(selectArrayId({ requested: "tablet_of_water" })).toBe("tablet_of_water");
  });

  it("falls back to the environment", () => {
    expect(selectArrayId({ envArray: "tablet of earth" })).toBe("tablet_of_earth");
  });

  it("request overrides env", () => {
    expect(selectArrayId({ requested: "tablet of air", envArray: "tablet of earth" })).toBe("tablet_of_air");
  });

  it("rejects unknown names", () => {
    expect(() => selectArrayId({ requested: "tablet of ice" })).toThrow("Unknown array: tablet of ice");
  });
});

describe("createDriver", () => {
  it("starts a local game on the selected array", () => {
    const driver = createDriver({ requested: "tablet of air", envArray: undefined });
    expect(driver.mode).toBe("local");
    expect(driver.getArrayId()).toBe("tablet_of_air");
    expect(driver.currentArmy()).toBe("red");
  });
});
