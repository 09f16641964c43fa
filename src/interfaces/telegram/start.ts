import 'dotenv/config';

import process from 'node:process';

import { getBotHome, getLogDir } from '../../runtime/botHome.js';
import { createBotConfig } from '../../runtime/botConfig.js';
import { reportStartupError } from '../../runtime/startupErrors.js';
import { createSubstitutionEngine } from '../../pdf/substitution.js';
import { createRuntimeLogger } from '../../utils/runtimeLogger.js';
import { createPdfBot } from './bot.js';
import { allowUserIds } from './policy.js';

const botHome = getBotHome(process.env);
const logDir = getLogDir(process.env);

const start = async () => {
  const config = createBotConfig(botHome);

  // Token and owner are fixed for the process; rules stay live.
  const token = await config.token();
  const authorizedUserId = await config.authorizedUserId();
  await config.rules();

  const engine = createSubstitutionEngine({
    loadRules: config.rules,
    logger: createRuntimeLogger({ logDir, component: 'pdf.substitution' }),
  });

  const pdfBot = createPdfBot({
    token,
    authorize: allowUserIds([authorizedUserId]),
    engine,
    logDir,
  });

  const shutdown = new AbortController();
  process.once('SIGINT', () => shutdown.abort());
  process.once('SIGTERM', () => shutdown.abort());

  console.log('redliner (telegram) starting…');
  await pdfBot.start(shutdown.signal);
};

start().catch((err) => {
  reportStartupError(err, { mode: 'telegram', botHome, logDir });
  process.exit(1);
});
