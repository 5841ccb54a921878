export function printHelp(message?: string): void {
  if (message) {
    console.error(message);
    console.error('');
  }

  const lines = [
    'tasktui — terminal task list',
    '',
    'Usage: tasktui [options]',
    '',
    formatSection('Options', [
      ['--debug', 'Show the debug log pane'],
      ['--file, -f <path>', 'Task file (default: todos.json)'],
      ['--config, -c <path>', 'Path to config file'],
      ['--no-color', 'Disable colors'],
      ['--help, -h', 'Show help'],
      ['--version, -v', 'Show version'],
    ]),
    '',
    formatSection('Keys', [
      ['↑/↓', 'Navigate tasks'],
      ['Space', 'Toggle task completion'],
      ['a / d', 'Add / delete task'],
      ['h', 'Show help'],
      ['Ctrl+Space', 'Hide/show the task list'],
      ['q', 'Quit'],
    ]),
    '',
    formatSection('Config', [
      ['Project config', 'Nearest .tasktui.json (walks up from cwd)'],
      ['Global config', '~/.config/tasktui/config.json'],
      ['Key fields', 'file, debug, colors.disable'],
    ]),
  ];

  console.error(lines.join('\n'));
}

function formatSection(title: string, entries: [string, string][]): string {
  const maxLen = Math.max(...entries.map(([name]) => name.length));
  const formatted = entries.map(([name, desc]) => `  ${name.padEnd(maxLen)}  ${desc}`);
  return [title, ...formatted].join('\n');
}

export function printVersion(version: string): void {
  console.log(version);
}
