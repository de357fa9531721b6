/**
 * Session: the value a host holds.  It owns the model, the filter, the
 * view and the renderer, and drives them one frame at a time.
 *
 *   const session = createSession({ alphabet, trainingText });
 *   session.attachRenderer(screen);
 *   session.start(performance.now());
 *   requestAnimationFrame(function tick(t) { session.frame(t); ... });
 */

import type { Alphabet } from "./alphabet";
import type { ColourScheme } from "./colours";
import {
  alphabetRules,
  createConversionManager,
  type ConversionManager,
  type ConversionRule,
} from "./conversion";
import type { Dictionary } from "./dictionary";
import { ConfigurationError, InvariantError } from "./errors";
import { createFrameRate } from "./frame-rate";
import { createFilter, createPointerDevice } from "./input";
import type { FilterContext, FilterKind, InputFilter } from "./input/filter";
import { consoleLogger, type Logger } from "./logger";
import { createDasherModel, type DasherModel, type Refusal } from "./model";
import { createCombinedModel, type LanguageModel } from "./models";
import type { ControlKind } from "./node";
import { createPpmModel } from "./ppm";
import { createRenderer, type Renderer } from "./render";
import { buildScene, type Scene } from "./scene";
import { parseSettings, type Settings } from "./settings";
import { trainOnText } from "./training";
import type { InputDevice, Screen, VirtualKey } from "./types";
import { createView, type View } from "./view";

export interface SessionListeners {
  /** The output text changed; receives the whole (converted) text. */
  onOutput?(text: string): void;
  onRefused?(refusal: Refusal): void;
  onControl?(kind: ControlKind): void;
  /** An accept control was committed. */
  onAccept?(text: string): void;
}

export interface SessionOptions {
  alphabet: Alphabet;
  /** Validated with `parseSettings`. */
  settings?: unknown;
  /** Used as is; otherwise a PPM model, blended with `dictionary` if given. */
  languageModel?: LanguageModel;
  dictionary?: Dictionary;
  trainingText?: string;
  conversionRules?: readonly ConversionRule[];
  colourScheme?: ColourScheme;
  logger?: Logger;
  /** Random source for the demo filter. */
  random?: () => number;
  listeners?: SessionListeners;
}

export interface Session {
  readonly settings: Settings;
  readonly model: DasherModel;
  readonly view: View;
  readonly filter: InputFilter;
  readonly started: boolean;
  readonly conversion: ConversionManager | undefined;
  /** Scene of the last rendered frame. */
  readonly lastScene: Scene | undefined;

  attachRenderer(screen: Screen): void;
  attachInput(device: InputDevice): void;
  setFilter(filter: FilterKind | InputFilter): void;

  start(t: number): void;
  /** Drain the queue, pause, and stop rendering until `start`. */
  stop(): void;
  pause(): void;
  resume(t: number): void;
  /** Empty the output and grow a fresh root. */
  reset(): void;
  /** Run one frame; true if it rendered. */
  frame(t: number): boolean;

  keyDown(key: VirtualKey, t: number): void;
  keyUp(key: VirtualKey, t: number): void;
  /** Feed the built-in pointer device, in screen pixels. */
  mousePosition(x: number, y: number): void;
  mouseLeave(): void;

  outputText(): string;
  offset(): number;
  backspace(): boolean;
  /** Replace the output text.  The language model is not retrained. */
  editOutput(text: string): void;
  setGameTarget(text: string | undefined): void;
}

function defaultModel(options: SessionOptions, settings: Settings, logger: Logger): LanguageModel {
  const { alphabet, dictionary } = options;
  const ppm = createPpmModel({ order: settings.lmOrder, alphabetSize: alphabet.size });
  const lm = dictionary
    ? createCombinedModel({
        alphabet,
        ppm,
        dictionary,
        ppmWeight: settings.ppmWeight,
        contextLength: settings.contextLength,
      })
    : ppm;
  if (options.trainingText !== undefined) {
    const learnt = trainOnText(lm, options.trainingText, alphabet);
    logger.info(`trained ${alphabet.name} model on ${learnt} symbols`);
  }
  return lm;
}

export function createSession(options: SessionOptions): Session {
  const { alphabet } = options;
  const settings = parseSettings(options.settings ?? {});
  const logger = options.logger ?? consoleLogger;
  const listeners = options.listeners ?? {};

  if (alphabet.size === 0) {
    throw new ConfigurationError(`alphabet "${alphabet.name}" has no symbols`);
  }

  const conversion =
    alphabet.conversion === "none"
      ? undefined
      : createConversionManager(alphabet.conversion, [
          ...(options.conversionRules ?? []),
          ...alphabetRules(alphabet),
        ]);

  const frameRate = createFrameRate(settings.bitRate, settings.minSteps);
  const view = createView(1, 1, alphabet.orientation);
  const mouse = createPointerDevice();
  let input: InputDevice = mouse;
  let filter: InputFilter = createFilter(settings.filter, settings, options.random);
  let renderer: Renderer | undefined;
  let started = false;
  let dirty = true;
  let lastTime = 0;
  let lastScene: Scene | undefined;

  const outputText = () => {
    const text = model.outputText();
    return conversion ? conversion.convert(text) : text;
  };

  const model = createDasherModel({
    alphabet,
    languageModel: options.languageModel ?? defaultModel(options, settings, logger),
    controls: settings.controls,
    controlShare: settings.controlShare,
    requireConversion: conversion !== undefined,
    logger,
    listeners: {
      onOutput: () => listeners.onOutput?.(outputText()),
      onDelete: () => listeners.onOutput?.(outputText()),
      onRefused: (refusal) => {
        if (refusal.reason === "overflow") filter.pause();
        listeners.onRefused?.(refusal);
      },
      onControl: (kind) => {
        if (kind === "accept" || kind === "pause") filter.pause();
        if (kind === "accept") listeners.onAccept?.(outputText());
        listeners.onControl?.(kind);
      },
    },
  });

  const context = (): FilterContext => ({ model, view, input, frameRate, logger });

  function checkInvariants(): void {
    const problem = model.checkInvariants();
    if (!problem) return;
    if (settings.debug) throw new InvariantError(problem);
    logger.warn(`${problem}; rebuilding the root`);
    model.rebuild();
  }

  return {
    settings,
    model,
    view,

    get filter() {
      return filter;
    },
    get started() {
      return started;
    },
    conversion,
    get lastScene() {
      return lastScene;
    },

    attachRenderer(screen) {
      renderer?.dispose();
      renderer = createRenderer(screen, { scheme: options.colourScheme });
      view.resize(screen.width, screen.height);
      dirty = true;
    },

    attachInput(device) {
      input = device;
    },

    setFilter(next) {
      const wasRunning = started && !filter.paused;
      filter.pause();
      filter = typeof next === "string" ? createFilter(next, settings, options.random) : next;
      if (wasRunning) filter.resume(lastTime);
      model.clearScheduledSteps();
      dirty = true;
    },

    start(t) {
      started = true;
      lastTime = t;
      frameRate.reset(t);
      filter.resume(t);
      dirty = true;
    },

    stop() {
      model.clearScheduledSteps();
      filter.pause();
      started = false;
    },

    pause() {
      filter.pause();
      model.clearScheduledSteps();
      dirty = true;
    },

    resume(t) {
      filter.resume(t);
      dirty = true;
    },

    reset() {
      model.rebuild("");
      filter.reset();
      frameRate.reset(lastTime);
      dirty = true;
      listeners.onOutput?.(outputText());
    },

    frame(t) {
      if (!renderer || !started) return false;
      frameRate.record(t);
      lastTime = t;

      const screen = renderer.screen;
      if (screen.width !== view.width || screen.height !== view.height) {
        view.resize(screen.width, screen.height);
        dirty = true;
      }

      let changed = dirty;
      dirty = false;
      // Paused filters still see the input; circle start waits on it.
      if (filter.process(context(), t)) changed = true;
      if (filter.paused) model.clearScheduledSteps();

      if (model.nextScheduledStep() !== "idle") {
        changed = true;
        checkInvariants();
      }
      if (!changed) return false;

      const scene = buildScene(model, view, settings);
      renderer.render(scene, view, (s, v) => filter.decorate?.(s, v));
      lastScene = scene;
      return true;
    },

    keyDown(key, t) {
      lastTime = t;
      dirty = true;
      if (key === "backspace") {
        model.backspace();
        return;
      }
      mouse.press(key);
      filter.keyDown(key, t, context());
    },

    keyUp(key, t) {
      mouse.release(key);
      filter.keyUp(key, t, context());
    },

    mousePosition(x, y) {
      mouse.setPosition(x, y);
    },

    mouseLeave() {
      mouse.clear();
    },

    outputText,

    offset() {
      return model.offset();
    },

    backspace() {
      const done = model.backspace();
      if (done) dirty = true;
      return done;
    },

    editOutput(text) {
      model.rebuild(text);
      dirty = true;
      listeners.onOutput?.(outputText());
    },

    setGameTarget(text) {
      model.setGameTarget(text);
      dirty = true;
    },
  };
}
