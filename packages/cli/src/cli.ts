import { Builtins, Cli } from 'clipanion';
import { ConfigCheckCommand } from './cmd/config-check.js';
import { VERSION } from './version.js';

export function createCli(): Cli {
  const cli = new Cli({
    binaryLabel: 'Strata CLI',
    binaryName: 'strata',
    binaryVersion: VERSION,
  });

  cli.register(ConfigCheckCommand);
  cli.register(Builtins.HelpCommand);
  cli.register(Builtins.VersionCommand);

  return cli;
}
