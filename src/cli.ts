import { runCommand } from './commands/index';
import type { CommandContext } from './commands/index';
import { formatHistory } from './features/report';
import type { AppServices } from './services';

// Команды, доступные без интерактивного режима: `passkit gen 20`
export const CLI_COMMANDS = [
  'gen', 'pattern', 'req', 'memorable',
  'check', 'details', 'compare',
  'history', 'config', 'version', 'help',
];

export function isCliCommand(name: string | undefined): name is string {
  return name !== undefined && CLI_COMMANDS.includes(name);
}

/** Runs one command and returns the process exit code. */
export function runCli(
  args: string[],
  services: AppServices,
  out: (text: string) => void,
  err: (text: string) => void,
): number {
  const [name = 'help', ...rest] = args;
  let failed = false;

  const ctx: CommandContext = {
    services,
    add: (role, content) => {
      if (role === 'error') { failed = true; err(content); }
      else out(content);
    },
    clear: () => {},
    exit: () => {},
    openScreen: () => out(formatHistory(services.history.getAllWithMetadata())),
  };

  runCommand(ctx, '/' + name, rest.join(' '));
  return failed ? 1 : 0;
}
