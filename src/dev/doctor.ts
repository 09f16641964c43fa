import 'dotenv/config';

import { getBotHome, getLogDir } from '../runtime/botHome.js';
import { formatCheckResult, runConfigChecks } from './configCheck.js';

const botHome = getBotHome(process.env);
const logDir = getLogDir(process.env);

console.log('redliner doctor (preflight)');
console.log(`REDLINER_HOME: ${botHome}`);

const results = await runConfigChecks({ botHome, logDir });
for (const result of results) {
  console.log(formatCheckResult(result));
}

if (results.some((result) => result.status === 'FAIL')) {
  console.error('Doctor found blocking issues. Fix the failures above and re-run `npm run doctor`.');
  process.exit(1);
}

console.log('Doctor finished with no blocking issues.');
