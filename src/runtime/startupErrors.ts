import path from 'node:path';

import { RULES_FILE, TOKEN_FILE, USER_ID_FILE } from './botConfig.js';
import { ConfigurationUnavailableError, describeError } from './errors.js';

type StartupMode = 'telegram' | 'doctor';

type StartupErrorContext = {
  mode: StartupMode;
  botHome: string;
  logDir: string;
};

const uniqueSteps = (steps: string[]): string[] => {
  return Array.from(new Set(steps));
};

const buildNextSteps = (err: unknown, botHome: string): string[] => {
  const steps: string[] = [];
  const failedFile = err instanceof ConfigurationUnavailableError ? path.basename(err.path) : null;

  if (failedFile === TOKEN_FILE) {
    steps.push(`Put the bot token from @BotFather in ${path.join(botHome, TOKEN_FILE)}.`);
  }
  if (failedFile === USER_ID_FILE) {
    steps.push(`Put your numeric Telegram user id in ${path.join(botHome, USER_ID_FILE)}.`);
  }
  if (failedFile === RULES_FILE) {
    steps.push(
      `Fix ${path.join(botHome, RULES_FILE)}: a YAML list of entries with "replace" and "with" keys.`,
    );
  }
  if (!failedFile) {
    steps.push('Set REDLINER_HOME to the directory holding the configuration files.');
  }

  steps.push('Run `npm run doctor` to validate the configuration files.');
  return uniqueSteps(steps);
};

export function reportStartupError(err: unknown, context: StartupErrorContext): void {
  console.error(`redliner (${context.mode}) failed to start.`);
  console.error(`Reason: ${describeError(err)}`);
  console.error('Relevant paths:');
  console.error(`- REDLINER_HOME: ${context.botHome}`);
  console.error(`- Token: ${path.join(context.botHome, TOKEN_FILE)}`);
  console.error(`- User id: ${path.join(context.botHome, USER_ID_FILE)}`);
  console.error(`- Rules: ${path.join(context.botHome, RULES_FILE)}`);
  console.error(`- Logs: ${context.logDir}`);
  console.error('Next steps:');
  for (const step of buildNextSteps(err, context.botHome)) {
    console.error(`- ${step}`);
  }
}
