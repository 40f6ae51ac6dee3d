import { Command, Option } from 'clipanion';
import { Chalk } from 'chalk';
import pino from 'pino';
import { isMode, modeFromNodeEnv } from '@strata/config';
import { loadHttpConfiguration } from '@strata/http-config';
import { formatFailure, formatSuccess, redactSecret, summarizeError } from '../format.js';

export class ConfigCheckCommand extends Command {
  static paths = [['config', 'check']];

  static usage = Command.Usage({
    description: 'Resolve and validate the HTTP configuration of an application',
    details:
      'Reads conf/application.json under the application root on top of the reference defaults and exits non-zero when startup would be refused.',
    examples: [
      ['Check the current directory', 'strata config check'],
      ['Check as production', 'strata config check --mode prod'],
      ['JSON output', 'strata config check --root ./my-app --format json'],
    ],
  });

  root = Option.String('--root', { description: 'Application root directory (default: current directory)' });
  mode = Option.String('--mode', { description: 'Mode: dev|test|prod (default: from NODE_ENV)' });
  format = Option.String('--format', 'text', { description: 'Output format: text|json' });

  async execute(): Promise<number> {
    const { env, stdout, stderr } = this.context;
    const mode = this.mode ?? modeFromNodeEnv(env.NODE_ENV);
    if (!isMode(mode)) {
      stderr.write(`Unknown mode "${mode}" (expected dev, test or prod)\n`);
      return 2;
    }
    if (this.format !== 'text' && this.format !== 'json') {
      stderr.write(`Unknown format "${this.format}" (expected text or json)\n`);
      return 2;
    }

    const color = new Chalk({ level: this.context.colorDepth > 1 ? 1 : 0 });
    const logger = pino({ name: 'strata', level: env.LOG_LEVEL || 'warn' }, stderr);

    const { result } = loadHttpConfiguration({ rootPath: this.root, mode, env, logger });

    if (this.format === 'json') {
      const body = result.ok
        ? { ok: true, mode, configuration: redactSecret(result.value) }
        : { ok: false, mode, error: summarizeError(result.error) };
      stdout.write(`${JSON.stringify(body, null, 2)}\n`);
    } else if (result.ok) {
      stdout.write(`${formatSuccess(result.value, mode, color)}\n`);
    } else {
      stdout.write(`${formatFailure(result.error, mode, color)}\n`);
    }

    return result.ok ? 0 : 1;
  }
}
