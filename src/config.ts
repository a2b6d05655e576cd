import * as dotenv from 'dotenv';
import { existsSync, readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

export const APP_NAME = 'query_json';

// Written by `npm run stamp` at release time; absent in a dev checkout.
export const BUILD_ENV_PATH = fileURLToPath(new URL('../build.env', import.meta.url));

const buildEnvSchema = z.object({
  VERSION: z.string().min(1).catch('dev'),
  COMMIT: z.string().min(1).catch('unknown'),
  DATE: z.string().min(1).catch('unknown'),
});

export type BuildInfo = {
  readonly version: string;
  readonly commit: string;
  readonly date: string;
};

export function loadBuildInfo(path = BUILD_ENV_PATH): BuildInfo {
  const vars = existsSync(path) ? dotenv.parse(readFileSync(path, 'utf-8')) : {};
  const env = buildEnvSchema.parse(vars);
  return Object.freeze({ version: env.VERSION, commit: env.COMMIT, date: env.DATE });
}

export function versionBanner(info: BuildInfo): string {
  return `${APP_NAME} version ${info.version}\n`
    + `  commit: ${info.commit}\n`
    + `  built: ${info.date}\n`;
}
