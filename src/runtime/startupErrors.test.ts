import path from 'node:path';
import { afterEach, describe, expect, it, vi } from 'vitest';

import { ConfigurationUnavailableError } from './errors.js';
import { reportStartupError } from './startupErrors.js';

describe('reportStartupError', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  const capture = (err: unknown): string[] => {
    const lines: string[] = [];
    vi.spyOn(console, 'error').mockImplementation((line: unknown) => {
      lines.push(String(line));
    });
    reportStartupError(err, { mode: 'telegram', botHome: '/srv/bot', logDir: '/srv/bot/logs' });
    return lines;
  };

  it('names the failing file and how to fix it', () => {
    const tokenPath = path.join('/srv/bot', '.token.txt');
    const lines = capture(new ConfigurationUnavailableError(tokenPath, `Bot token file ${tokenPath} is empty.`));

    expect(lines[0]).toBe('redliner (telegram) failed to start.');
    expect(lines[1]).toBe(`Reason: Bot token file ${tokenPath} is empty.`);
    expect(lines).toContain(`- Put the bot token from @BotFather in ${tokenPath}.`);
    expect(lines.at(-1)).toBe('- Run `npm run doctor` to validate the configuration files.');
  });

  it('suggests REDLINER_HOME for other failures', () => {
    const lines = capture(new Error('boom'));

    expect(lines).toContain('- Set REDLINER_HOME to the directory holding the configuration files.');
  });
});
