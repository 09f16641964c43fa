import path from 'node:path';

/**
 * Directory holding the bot's flat configuration files (token, user id, rules).
 *
 * Defaults to the working directory so the files sit next to wherever the bot is launched.
 */
export function getBotHome(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.REDLINER_HOME?.trim();
  if (override) return path.resolve(override);
  return process.cwd();
}

export function getLogDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.LOG_DIR?.trim();
  if (override) return path.resolve(override);
  return path.join(getBotHome(env), 'logs');
}
