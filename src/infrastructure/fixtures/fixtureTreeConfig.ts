import { resolve } from "node:path";

import { UsageError } from "../../usecases/errors.js";

export type FixtureTreeConfig = {
  depth: number;
  maxAgeDays: number;
  root: string;
  seed: number;
  users: number;
};

function parseNumber(value: string | undefined, fallback: number, minimum = 1): number {
  if (!value) return fallback;
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed < minimum) return fallback;
  return parsed;
}

export function loadFixtureTreeConfig(
  args: string[],
  env: NodeJS.ProcessEnv,
  nowMs: number = Date.now(),
): FixtureTreeConfig {
  const root = args[0] || env.FIXTURE_TREE_ROOT;
  if (!root) {
    throw new UsageError("Please provide the root path as the first argument to this script!");
  }

  return {
    depth: parseNumber(env.FIXTURE_TREE_DEPTH, 5),
    maxAgeDays: parseNumber(env.FIXTURE_TREE_MAX_AGE_DAYS, 60),
    root: resolve(root),
    seed: parseNumber(env.FIXTURE_TREE_SEED, nowMs % 2 ** 31, 0),
    users: parseNumber(env.FIXTURE_TREE_USERS, 52),
  };
}
