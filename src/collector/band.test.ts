import { describe, expect, it } from "vitest";
import { deriveBand } from "./band.js";

describe("deriveBand", () => {
  it("reports Off when the radio is not on", () => {
    expect(deriveBand("off", "0xe009", "6")).toBe("Off");
  });

  it("identifies 900 MHz boards regardless of channel", () => {
    expect(deriveBand("on", "0xe009", "6")).toBe("900MHz");
  });

  it("derives the band from the channel", () => {
    expect(deriveBand("on", "0x0000", "6")).toBe("2.4GHz");
    expect(deriveBand("on", "0x0000", "80")).toBe("3.4GHz");
    expect(deriveBand("on", "0x0000", "3420")).toBe("3.4GHz");
    expect(deriveBand("on", "0x0000", "149")).toBe("5.8GHz");
  });

  it("falls back to Unknown", () => {
    expect(deriveBand("on", "", "")).toBe("Unknown");
    expect(deriveBand("on", "", "999")).toBe("Unknown");
  });
});
