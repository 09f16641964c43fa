import { access, copyFile, mkdir } from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { RULES_FILE, TOKEN_FILE, USER_ID_FILE } from '../runtime/botConfig.js';
import { getBotHome } from '../runtime/botHome.js';

const repoRoot = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../..');

const botHome = getBotHome(process.env);
const force = process.argv.includes('--force');

const exampleRulesPath = path.join(repoRoot, 'config', 'actions.example.yaml');
const targetRulesPath = path.join(botHome, RULES_FILE);

const exists = async (target: string): Promise<boolean> => {
  try {
    await access(target);
    return true;
  } catch {
    return false;
  }
};

await mkdir(botHome, { recursive: true });

if ((await exists(targetRulesPath)) && !force) {
  console.log(`${targetRulesPath} already exists. Nothing to do.`);
  console.log('Use --force to overwrite it with the example rules.');
} else {
  await copyFile(exampleRulesPath, targetRulesPath);
  console.log(`Created ${targetRulesPath}`);
}

console.log(`REDLINER_HOME=${botHome}`);
console.log(`Write the bot token to ${path.join(botHome, TOKEN_FILE)}`);
console.log(`and your numeric Telegram user id to ${path.join(botHome, USER_ID_FILE)} before starting.`);
