import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { load as parseYaml } from 'js-yaml';
import { z } from 'zod';

import { getBotHome } from './botHome.js';
import { ConfigurationUnavailableError, describeError } from './errors.js';

export const TOKEN_FILE = '.token.txt';
export const USER_ID_FILE = '.user_id.txt';
export const RULES_FILE = '.actions.yaml';

export type ReplacementRule = {
  find: string;
  replacement: string;
};

const RULE_ENTRY_SCHEMA = z
  .object({
    replace: z.string().nullish(),
    with: z.string().nullish(),
  })
  .passthrough();

// An empty YAML document parses to null/undefined: no rules.
const RULES_FILE_SCHEMA = z.array(RULE_ENTRY_SCHEMA).nullish();

export type BotConfigPaths = {
  tokenPath: string;
  userIdPath: string;
  rulesPath: string;
};

export type BotConfig = {
  paths: BotConfigPaths;
  token: () => Promise<string>;
  authorizedUserId: () => Promise<number>;
  rules: () => Promise<ReplacementRule[]>;
};

export function resolveBotConfigPaths(botHome: string): BotConfigPaths {
  return {
    tokenPath: path.join(botHome, TOKEN_FILE),
    userIdPath: path.join(botHome, USER_ID_FILE),
    rulesPath: path.join(botHome, RULES_FILE),
  };
}

async function readConfigFile(filePath: string): Promise<string> {
  try {
    return await readFile(filePath, 'utf8');
  } catch (err) {
    throw new ConfigurationUnavailableError(
      filePath,
      `Cannot read ${filePath}: ${describeError(err)}`,
      { cause: err },
    );
  }
}

export async function readToken(filePath: string): Promise<string> {
  const token = (await readConfigFile(filePath)).trim();
  if (!token) {
    throw new ConfigurationUnavailableError(filePath, `Bot token file ${filePath} is empty.`);
  }
  return token;
}

export async function readAuthorizedUserId(filePath: string): Promise<number> {
  const raw = (await readConfigFile(filePath)).trim();
  if (!/^-?\d+$/.test(raw)) {
    throw new ConfigurationUnavailableError(
      filePath,
      `User id file ${filePath} must contain a single integer, got "${raw}".`,
    );
  }

  const userId = Number.parseInt(raw, 10);
  if (!Number.isSafeInteger(userId)) {
    throw new ConfigurationUnavailableError(filePath, `User id in ${filePath} is out of range.`);
  }
  return userId;
}

/**
 * Reads the ordered replacement rules. Entries missing `replace` or `with`, or leaving
 * either blank, are kept as rules with an empty side so the engine skips them.
 */
export async function readRules(filePath: string): Promise<ReplacementRule[]> {
  const raw = await readConfigFile(filePath);

  let parsed: unknown;
  try {
    parsed = parseYaml(raw, { filename: filePath });
  } catch (err) {
    throw new ConfigurationUnavailableError(
      filePath,
      `Invalid YAML in ${filePath}: ${describeError(err)}`,
      { cause: err },
    );
  }

  const res = RULES_FILE_SCHEMA.safeParse(parsed);
  if (!res.success) {
    throw new ConfigurationUnavailableError(
      filePath,
      `Invalid rules file at ${filePath}: ${res.error.message}`,
    );
  }

  return (res.data ?? []).map((entry) => ({
    find: entry.replace ?? '',
    replacement: entry.with ?? '',
  }));
}

/**
 * Read-through accessors over the configuration files. Nothing is cached: every call hits
 * the filesystem, so rule edits apply to the next document without a restart.
 */
export function createBotConfig(botHome: string = getBotHome()): BotConfig {
  const paths = resolveBotConfigPaths(botHome);

  return {
    paths,
    token: () => readToken(paths.tokenPath),
    authorizedUserId: () => readAuthorizedUserId(paths.userIdPath),
    rules: () => readRules(paths.rulesPath),
  };
}
