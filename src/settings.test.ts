import { describe, it, expect } from "vitest";
import { ConfigurationError } from "./errors";
import { parseSettings, settingsFromParams } from "./settings";

describe("parseSettings", () => {
  it("fills in defaults", () => {
    const settings = parseSettings();
    expect(settings.lmOrder).toBe(3);
    expect(settings.bitRate).toBe(10);
    expect(settings.filter).toBe("pointer");
    expect(settings.controls).toEqual([]);
    expect(settings.controlShare).toBe(0.05);
    expect(settings.debug).toBe(false);
  });

  it("keeps given values", () => {
    const settings = parseSettings({ bitRate: 6, filter: "demo", controls: ["backspace"] });
    expect(settings.bitRate).toBe(6);
    expect(settings.filter).toBe("demo");
    expect(settings.controls).toEqual(["backspace"]);
  });

  it("lists every problem", () => {
    let error: unknown;
    try {
      parseSettings({ lmOrder: 9, filter: "joystick" });
    } catch (e) {
      error = e;
    }
    expect(error).toBeInstanceOf(ConfigurationError);
    if (!(error instanceof ConfigurationError)) return;
    expect(error.issues).toHaveLength(2);
    expect(error.issues[0]).toMatch(/^lmOrder: /);
    expect(error.issues[1]).toMatch(/^filter: /);
  });

  it("rejects a control share of the whole node", () => {
    expect(() => parseSettings({ controlShare: 1 })).toThrow(ConfigurationError);
  });
});

describe("settingsFromParams", () => {
  it("converts values by the type of their default", () => {
    const settings = settingsFromParams(
      new URLSearchParams("bitRate=8.5&slowStart=0&debug=true&filter=one-button&controls=backspace, space"),
    );
    expect(settings.bitRate).toBe(8.5);
    expect(settings.slowStart).toBe(false);
    expect(settings.debug).toBe(true);
    expect(settings.filter).toBe("one-button");
    expect(settings.controls).toEqual(["backspace", "space"]);
  });

  it("ignores unknown keys and inherited names", () => {
    const settings = settingsFromParams(new URLSearchParams("colour=red&toString=1"));
    expect(settings).toEqual(parseSettings());
  });

  it("reads an empty list", () => {
    expect(settingsFromParams(new URLSearchParams("controls=")).controls).toEqual([]);
  });

  it("rejects values that do not convert", () => {
    expect(() => settingsFromParams(new URLSearchParams("slowStart=maybe"))).toThrow(ConfigurationError);
    expect(() => settingsFromParams(new URLSearchParams("bitRate=fast"))).toThrow(ConfigurationError);
  });
});
