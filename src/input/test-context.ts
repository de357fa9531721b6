import { createAlphabet } from "../alphabet";
import { createFrameRate } from "../frame-rate";
import { silentLogger } from "../logger";
import { createDasherModel } from "../model";
import { createPpmModel } from "../ppm";
import { parseSettings } from "../settings";
import { createView } from "../view";
import type { FilterContext } from "./filter";
import { createPointerDevice } from "./pointer-device";

/**
 * Filter context over eight equally likely symbols, an 800×600 view and
 * a pointer device.  The fresh root sits at [228, 3868] and the frame
 * rate asks for one step until a frame is recorded.
 */
export function testContext() {
  const alphabet = createAlphabet({
    name: "uniform",
    groups: [{ name: "all", characters: Array.from("abcdefgh").map((text) => ({ text })) }],
  });
  const model = createDasherModel({
    alphabet,
    languageModel: createPpmModel({ order: 2, alphabetSize: alphabet.size }),
    logger: silentLogger,
  });
  const device = createPointerDevice();
  const ctx: FilterContext = {
    model,
    view: createView(800, 600),
    input: device,
    frameRate: createFrameRate(10),
    logger: silentLogger,
  };
  return { ctx, model, device, settings: parseSettings() };
}
