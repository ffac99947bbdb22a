import { MikroConf } from "mikroconf";

export type PurgeReportOptions = {
  mountPrefix: string;
  quiet: boolean;
};

export type ResolvePurgeReportOptionsInput = {
  configFilePath?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: Partial<PurgeReportOptions>;
};

export const DEFAULT_PURGE_REPORT_CONFIG_FILE_PATH = "purge-report.config.json";

const DEFAULT_OPTIONS: PurgeReportOptions = {
  mountPrefix: "/mnt/orangefs/",
  quiet: false,
};

function asTrimmedString(value: unknown): string | undefined {
  if (typeof value !== "string") return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function asBoolean(value: unknown): boolean | undefined {
  if (typeof value === "boolean") return value;
  if (typeof value === "number") {
    if (value === 1) return true;
    if (value === 0) return false;
    return undefined;
  }
  if (typeof value !== "string") return undefined;

  const normalized = value.trim().toLowerCase();
  if (["true", "1", "yes", "on"].includes(normalized)) return true;
  if (["false", "0", "no", "off"].includes(normalized)) return false;
  return undefined;
}

function dropUndefined(value: Partial<PurgeReportOptions>): Partial<PurgeReportOptions> {
  const result: Partial<PurgeReportOptions> = {};
  if (value.mountPrefix !== undefined) result.mountPrefix = value.mountPrefix;
  if (value.quiet !== undefined) result.quiet = value.quiet;
  return result;
}

function normalizeOptions(
  value: Partial<Record<keyof PurgeReportOptions, unknown>>,
): PurgeReportOptions {
  return {
    mountPrefix: asTrimmedString(value.mountPrefix) ?? DEFAULT_OPTIONS.mountPrefix,
    quiet: asBoolean(value.quiet) ?? DEFAULT_OPTIONS.quiet,
  };
}

function readEnvOptions(env: NodeJS.ProcessEnv): Partial<PurgeReportOptions> {
  return dropUndefined({
    mountPrefix: asTrimmedString(env.PURGE_REPORT_MOUNT_PREFIX),
    quiet: asBoolean(env.PURGE_REPORT_QUIET),
  });
}

function defaultsAsConfigOptions() {
  return Object.entries(DEFAULT_OPTIONS).map(([path, defaultValue]) => ({
    defaultValue,
    path,
  }));
}

export function resolveConfigFilePath(
  args: string[],
  env: NodeJS.ProcessEnv = process.env,
): string {
  for (let index = 0; index < args.length; index++) {
    if (args[index] !== "--config") continue;
    const candidate = args[index + 1];
    if (candidate && !candidate.startsWith("-")) {
      return candidate;
    }
  }

  return asTrimmedString(env.PURGE_REPORT_CONFIG_PATH) ?? DEFAULT_PURGE_REPORT_CONFIG_FILE_PATH;
}

/**
 * Layers defaults, the JSON config file, environment variables and direct
 * overrides (lowest to highest precedence).
 */
export function resolvePurgeReportOptions(
  input: ResolvePurgeReportOptionsInput = {},
): PurgeReportOptions {
  const env = input.env ?? process.env;
  const configFilePath =
    input.configFilePath ??
    asTrimmedString(env.PURGE_REPORT_CONFIG_PATH) ??
    DEFAULT_PURGE_REPORT_CONFIG_FILE_PATH;

  const config = new MikroConf({
    config: {
      ...readEnvOptions(env),
      ...dropUndefined({
        mountPrefix: asTrimmedString(input.overrides?.mountPrefix),
        quiet: input.overrides?.quiet,
      }),
    },
    configFilePath,
    options: defaultsAsConfigOptions(),
  });

  return normalizeOptions(config.get<Partial<Record<keyof PurgeReportOptions, unknown>>>());
}
