import { Command } from '@oclif/core';

export const SHELL_CONFIG = `# pyroost: show the active virtualenv in the prompt
if [[ -n "$VIRTUAL_ENV_PROMPT" ]]; then
    PS1="$VIRTUAL_ENV_PROMPT$PS1"
fi`;

export default class ShellConfig extends Command {
  static override description = 'Show information to include in a shell config file';

  static override examples = ['<%= config.bin %> <%= command.id %> >> ~/.bashrc'];

  public async run(): Promise<void> {
    this.log(SHELL_CONFIG);
  }
}
