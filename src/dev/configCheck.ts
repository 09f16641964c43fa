import { access, mkdir } from 'node:fs/promises';
import { constants as fsConstants } from 'node:fs';

import { createBotConfig } from '../runtime/botConfig.js';
import { describeError } from '../runtime/errors.js';

export type CheckStatus = 'OK' | 'WARN' | 'FAIL';

export type CheckResult = {
  status: CheckStatus;
  label: string;
  details?: string;
};

export const formatDetails = (details?: string) => (details ? ` — ${details}` : '');

export function formatCheckResult(result: CheckResult): string {
  return `[${result.status}] ${result.label}${formatDetails(result.details)}`;
}

export async function runConfigChecks(input: { botHome: string; logDir: string }): Promise<CheckResult[]> {
  const config = createBotConfig(input.botHome);
  const results: CheckResult[] = [];

  try {
    await config.token();
    results.push({ status: 'OK', label: 'bot token', details: config.paths.tokenPath });
  } catch (err) {
    results.push({ status: 'FAIL', label: 'bot token', details: describeError(err) });
  }

  try {
    const userId = await config.authorizedUserId();
    results.push({ status: 'OK', label: 'authorized user', details: String(userId) });
  } catch (err) {
    results.push({ status: 'FAIL', label: 'authorized user', details: describeError(err) });
  }

  try {
    const rules = await config.rules();
    const active = rules.filter((rule) => rule.find && rule.replacement).length;
    const inert = rules.length - active;
    results.push({
      status: rules.length === 0 ? 'WARN' : 'OK',
      label: 'replacement rules',
      details:
        rules.length === 0
          ? 'no rules configured (documents come back unchanged)'
          : `${active} active${inert > 0 ? `, ${inert} skipped (missing replace/with)` : ''}`,
    });
  } catch (err) {
    results.push({ status: 'FAIL', label: 'replacement rules', details: describeError(err) });
  }

  try {
    await mkdir(input.logDir, { recursive: true });
    await access(input.logDir, fsConstants.W_OK);
    results.push({ status: 'OK', label: 'log dir writable', details: input.logDir });
  } catch (err) {
    results.push({ status: 'FAIL', label: 'log dir writable', details: describeError(err) });
  }

  return results;
}
