/**
 * Loaders for the bundled data files and for host-supplied ones.
 * Everything here runs before a session is created.
 */

import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { parseAlphabet, type Alphabet } from "./alphabet";
import { parseColourSchemes, type ColourScheme } from "./colours";
import { parseConversionRules } from "./training";
import type { ConversionRule } from "./conversion";
import { createDictionary, parseDictionary, type Dictionary } from "./dictionary";
import { ConfigurationError } from "./errors";
import { consoleLogger, type Logger } from "./logger";

/** Absolute path of a file under the bundled `data/` directory. */
export function dataPath(relative: string): string {
  return fileURLToPath(new URL(`../data/${relative}`, import.meta.url));
}

async function readJson(path: string): Promise<unknown> {
  const text = await readFile(path, "utf8");
  try {
    const json: unknown = JSON.parse(text);
    return json;
  } catch (e) {
    throw new ConfigurationError(`${path}: ${e instanceof Error ? e.message : String(e)}`);
  }
}

export async function loadAlphabet(
  path = dataPath("alphabets/english.json"),
  logger: Logger = consoleLogger,
): Promise<Alphabet> {
  const alphabet = parseAlphabet(await readJson(path));
  logger.info(`loaded alphabet "${alphabet.name}" (${alphabet.size} symbols)`);
  return alphabet;
}

export async function loadColourSchemes(
  path = dataPath("colours/default.json"),
): Promise<ColourScheme[]> {
  return parseColourSchemes(await readJson(path));
}

export async function loadDictionary(
  path = dataPath("dictionary/english.txt"),
  logger: Logger = consoleLogger,
): Promise<Dictionary> {
  const dictionary = createDictionary(parseDictionary(await readFile(path, "utf8")));
  logger.info(`loaded ${dictionary.wordCount} dictionary words from ${path}`);
  return dictionary;
}

export async function loadTrainingText(
  path = dataPath("training/english.txt"),
): Promise<string> {
  return readFile(path, "utf8");
}

export async function loadConversionRules(
  path: string,
  contextSensitive: boolean,
): Promise<ConversionRule[]> {
  return parseConversionRules(await readFile(path, "utf8"), contextSensitive);
}
