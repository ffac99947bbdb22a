import { access, constants, mkdir, utimes, writeFile } from "node:fs/promises";
import { join } from "node:path";

import { UsageError } from "../../usecases/errors.js";

export type RandomSource = () => number;

export type FixtureTreeBounds = {
  minDirWidth: number;
  maxDirWidth: number;
  minFileWidth: number;
  maxFileWidth: number;
};

export type FixtureTreeContext = {
  bounds: FixtureTreeBounds;
  maxAgeSeconds: number;
  nowSeconds: number;
  random: RandomSource;
};

export type FixtureTreeLevel = {
  depth: number;
  dirWidth: number;
  fileWidth: number;
};

export type FixtureTreeCounts = {
  directories: number;
  files: number;
};

export type GenerateFixtureTreeOptions = {
  depth: number;
  maxAgeSeconds: number;
  nowSeconds: number;
  random: RandomSource;
  root: string;
  users: number;
  bounds?: FixtureTreeBounds;
};

export type FixtureTreeSummary = FixtureTreeCounts & {
  userDirectories: string[];
};

export const DEFAULT_FIXTURE_BOUNDS: FixtureTreeBounds = {
  minDirWidth: 0,
  maxDirWidth: 3,
  minFileWidth: 0,
  maxFileWidth: 10,
};

const USER_NAME_LETTERS = "abcdefghijklmnopqrstuvwxyz";

export function mulberry32(seed: number): RandomSource {
  let value = seed >>> 0;
  return () => {
    value += 0x6d2b79f5;
    let t = value;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function randomInt(min: number, max: number, random: RandomSource): number {
  return Math.floor(random() * (max - min + 1)) + min;
}

/**
 * `a`..`z`, then `aa`..`zz`, then `aaa`..: the letter cycles and the repeat count
 * grows every 26 users.
 */
export function fixtureUserName(index: number): string {
  const letter = USER_NAME_LETTERS[index % USER_NAME_LETTERS.length];
  return letter.repeat(Math.floor(index / USER_NAME_LETTERS.length) + 1);
}

export async function createUserDirectories(root: string, count: number): Promise<string[]> {
  const userDirectories: string[] = [];
  for (let index = 0; index < count; index++) {
    const userDirectory = join(root, fixtureUserName(index));
    await mkdir(userDirectory);
    userDirectories.push(userDirectory);
  }
  return userDirectories;
}

export async function buildFixtureTree(
  parent: string,
  level: FixtureTreeLevel,
  context: FixtureTreeContext,
): Promise<FixtureTreeCounts> {
  const counts: FixtureTreeCounts = { directories: 0, files: 0 };
  if (level.depth <= 0) return counts;

  for (let index = 0; index < level.fileWidth; index++) {
    const lastUsed = context.nowSeconds - randomInt(0, context.maxAgeSeconds, context.random);
    const filePath = join(parent, `f${index}`);
    await writeFile(filePath, "", { flag: "a" });
    await utimes(filePath, lastUsed, lastUsed);
    counts.files++;
  }

  const { bounds, random } = context;
  for (let index = 0; index < level.dirWidth; index++) {
    const directory = join(parent, `d${index}`);
    await mkdir(directory);
    counts.directories++;

    const nested = await buildFixtureTree(
      directory,
      {
        depth: level.depth - 1,
        dirWidth: randomInt(bounds.minDirWidth, bounds.maxDirWidth, random),
        fileWidth: randomInt(bounds.minFileWidth, bounds.maxFileWidth, random),
      },
      context,
    );
    counts.directories += nested.directories;
    counts.files += nested.files;
  }

  return counts;
}

export async function generateFixtureTree(
  options: GenerateFixtureTreeOptions,
): Promise<FixtureTreeSummary> {
  try {
    await access(options.root, constants.W_OK | constants.X_OK);
  } catch (error) {
    throw new UsageError(
      `Please verify that the supplied path exists and is writable: ${options.root}`,
      { cause: error },
    );
  }

  const bounds = options.bounds ?? DEFAULT_FIXTURE_BOUNDS;
  const context: FixtureTreeContext = {
    bounds,
    maxAgeSeconds: options.maxAgeSeconds,
    nowSeconds: options.nowSeconds,
    random: options.random,
  };

  const userDirectories = await createUserDirectories(options.root, options.users);
  const summary: FixtureTreeSummary = { directories: 0, files: 0, userDirectories };

  for (const userDirectory of userDirectories) {
    const counts = await buildFixtureTree(
      userDirectory,
      {
        depth: options.depth,
        dirWidth: randomInt(Math.max(1, bounds.minDirWidth), bounds.maxDirWidth, options.random),
        fileWidth: randomInt(bounds.minFileWidth, bounds.maxFileWidth, options.random),
      },
      context,
    );
    summary.directories += counts.directories;
    summary.files += counts.files;
  }

  return summary;
}
