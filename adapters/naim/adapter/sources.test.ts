import { describe, it, expect } from "vitest";
import { canonicalSource, parseInputs, sourceLabel, vendorIdFor, vendorSourceId } from "./sources.js";

describe("source table", () => {
  it("maps vendor ids to canonical sources and back", () => {
    expect(canonicalSource("ana1")).toBe("analog_1");
    expect(canonicalSource("gcast")).toBe("chromecast");
    expect(vendorIdFor("chromecast")).toBe("gcast");
    expect(vendorIdFor("phono")).toBe("phono");
  });

  it("does not resolve prototype keys", () => {
    expect(canonicalSource("constructor")).toBe("constructor");
    expect(sourceLabel("toString")).toBe("toString");
  });

  it("strips the ussi prefix", () => {
    expect(vendorSourceId(" inputs/dig1 ")).toBe("dig1");
    expect(vendorSourceId("usb")).toBe("usb");
  });
});

describe("parseInputs", () => {
  it("builds the source list from /inputs children", () => {
    const sources = parseInputs([
      { name: "Turntable", ussi: "inputs/ana1", selectable: "1" },
      { ussi: "inputs/radio", selectable: "1" },
      { name: "TV", ussi: "inputs/hdmi", selectable: "0" },
      { name: "Coax", ussi: "inputs/dig2", selectable: "1", disabled: "1" },
      { name: "Favourites", ussi: "favourites" },
    ]);

    expect(sources).toEqual([
      { id: "analog_1", vendorId: "ana1", label: "Turntable", selectable: true },
      { id: "radio", vendorId: "radio", label: "Internet Radio", selectable: true },
      { id: "hdmi", vendorId: "hdmi", label: "TV", selectable: false },
    ]);
  });
});
